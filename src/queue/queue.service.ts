import { Injectable, Logger } from '@nestjs/common';
import {
  DeleteMessageCommand,
  Message,
  ReceiveMessageCommand,
  ReceiveMessageCommandOutput,
  SQSServiceException,
} from '@aws-sdk/client-sqs';
import { AwsClientFactory } from '../aws/aws-client.factory';
import { QueueMessage } from './interfaces';

/**
 * Queue Service
 *
 * Pulls messages from SQS and deletes them once processed.
 * Every call creates its own SQS client and destroys it before returning.
 */
@Injectable()
export class QueueService {
  private readonly logger = new Logger(QueueService.name);

  constructor(private readonly clientFactory: AwsClientFactory) {}

  /**
   * Receive messages from a queue
   *
   * @param queueUrl - The URL of the queue
   * @param maxMessages - Maximum number of messages to receive
   * @param waitTimeSeconds - Long polling duration
   * @returns The received messages, or an empty list if the queue rejected the request
   */
  async receiveMessages(
    queueUrl: string,
    maxMessages = 1,
    waitTimeSeconds = 1,
  ): Promise<QueueMessage[]> {
    const client = this.clientFactory.createSqsClient();
    let response: ReceiveMessageCommandOutput;

    try {
      response = await client.send(
        new ReceiveMessageCommand({
          QueueUrl: queueUrl,
          MaxNumberOfMessages: maxMessages,
          WaitTimeSeconds: waitTimeSeconds,
        }),
      );
    } catch (error) {
      if (!(error instanceof SQSServiceException)) {
        throw error;
      }

      this.logger.error(
        `Failed to receive messages from ${queueUrl}: ${error.name}: ${error.message}`,
      );

      return [];
    } finally {
      client.destroy();
    }

    if (!response.Messages) {
      return [];
    }

    return response.Messages.flatMap((message) => this.toQueueMessage(message));
  }

  /**
   * Delete a message from a queue
   * Errors are left to the caller
   *
   * @param queueUrl - The URL of the queue
   * @param receiptHandle - The handle of the received message
   */
  async deleteMessage(queueUrl: string, receiptHandle: string): Promise<void> {
    const client = this.clientFactory.createSqsClient();

    try {
      await client.send(
        new DeleteMessageCommand({
          QueueUrl: queueUrl,
          ReceiptHandle: receiptHandle,
        }),
      );

      this.logger.debug(`Deleted message from ${queueUrl}`);
    } finally {
      client.destroy();
    }
  }

  private toQueueMessage(message: Message): QueueMessage[] {
    if (message.ReceiptHandle === undefined || message.Body === undefined) {
      this.logger.warn(
        `Skipping message ${message.MessageId ?? '<unknown>'} without receipt handle or body`,
      );

      return [];
    }

    return [{ handle: message.ReceiptHandle, body: message.Body }];
  }
}
