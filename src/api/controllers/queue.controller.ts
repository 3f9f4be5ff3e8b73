import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { QueueService } from '../../queue';
import { DeleteMessageDto, ReceiveMessagesDto } from '../dto/queue';

@ApiTags('Queue')
@Controller('queue')
export class QueueController {
  private readonly logger = new Logger(QueueController.name);

  constructor(private readonly queueService: QueueService) {}

  @Post('receive')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Receive messages from a queue' })
  @ApiResponse({ status: 200, description: 'Messages received successfully' })
  @ApiResponse({ status: 400, description: 'Invalid request' })
  async receiveMessages(@Body() dto: ReceiveMessagesDto) {
    const { queueUrl, maxMessages, waitTimeSeconds } = dto;

    this.logger.log(`Receiving messages from queue: ${queueUrl}`);

    const messages = await this.queueService.receiveMessages(
      queueUrl,
      maxMessages,
      waitTimeSeconds,
    );

    return {
      messageCount: messages.length,
      messages,
    };
  }

  @Post('delete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Delete a received message from a queue' })
  @ApiResponse({ status: 200, description: 'Message deleted successfully' })
  @ApiResponse({ status: 400, description: 'Invalid request' })
  async deleteMessage(@Body() dto: DeleteMessageDto) {
    const { queueUrl, receiptHandle } = dto;

    this.logger.log(`Deleting message from queue: ${queueUrl}`);

    await this.queueService.deleteMessage(queueUrl, receiptHandle);

    return { success: true };
  }
}
