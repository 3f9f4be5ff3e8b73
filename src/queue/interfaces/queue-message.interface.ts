/**
 * Represents a message received from a queue
 */
export interface QueueMessage {
  /**
   * The receipt handle used for deleting the message
   */
  handle: string;

  /**
   * The raw text payload of the message
   */
  body: string;
}
