import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for deleting a received message from a queue
 */
export class DeleteMessageDto {
  @ApiProperty({
    description: 'The URL of the queue the message was received from',
    example: 'https://sqs.eu-west-1.amazonaws.com/000000000000/experiments',
  })
  @IsString()
  @IsNotEmpty()
  queueUrl!: string;

  @ApiProperty({
    description: 'The receipt handle of the message to delete',
    example: 'test-receipt-handle',
  })
  @IsString()
  @IsNotEmpty()
  receiptHandle!: string;
}
