import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

/**
 * DTO for receiving messages from a queue
 */
export class ReceiveMessagesDto {
  @ApiProperty({
    description: 'The URL of the queue to receive from',
    example: 'https://sqs.eu-west-1.amazonaws.com/000000000000/experiments',
  })
  @IsString()
  @IsNotEmpty()
  queueUrl!: string;

  @ApiPropertyOptional({
    description: 'Maximum number of messages to receive',
    example: 1,
    minimum: 1,
    maximum: 10,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  maxMessages?: number;

  @ApiPropertyOptional({
    description: 'Long polling duration in seconds',
    example: 1,
    minimum: 0,
    maximum: 20,
  })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(20)
  waitTimeSeconds?: number;
}
