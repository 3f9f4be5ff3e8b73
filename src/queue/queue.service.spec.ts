import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import {
  DeleteMessageCommand,
  QueueDoesNotExist,
  ReceiveMessageCommand,
  SQSClient,
} from '@aws-sdk/client-sqs';
import { AwsClientFactory, AWS_MODULE_OPTIONS } from '../aws';
import { QueueService } from './queue.service';

// Mock the client and commands, keep the real exception classes
jest.mock('@aws-sdk/client-sqs', () => ({
  ...jest.requireActual<typeof import('@aws-sdk/client-sqs')>(
    '@aws-sdk/client-sqs',
  ),
  SQSClient: jest.fn(),
  ReceiveMessageCommand: jest.fn(),
  DeleteMessageCommand: jest.fn(),
}));

const QUEUE_URL = 'http://localhost:4566/000000000000/experiments';

describe('QueueService', () => {
  let service: QueueService;
  let mockSend: jest.Mock;
  let mockDestroy: jest.Mock;

  beforeEach(async () => {
    jest.clearAllMocks();

    const MockedSQSClient = SQSClient as jest.MockedClass<typeof SQSClient>;
    mockSend = jest.fn();
    mockDestroy = jest.fn();

    MockedSQSClient.mockImplementation(
      () =>
        ({
          send: mockSend,
          destroy: mockDestroy,
        }) as unknown as SQSClient,
    );

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        QueueService,
        AwsClientFactory,
        {
          provide: AWS_MODULE_OPTIONS,
          useValue: { region: 'us-east-1', endpoint: 'http://localhost:4566' },
        },
      ],
    }).compile();

    service = module.get<QueueService>(QueueService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('receiveMessages', () => {
    it('should map received messages to handle and body', async () => {
      mockSend.mockResolvedValueOnce({
        Messages: [
          { MessageId: 'msg-1', ReceiptHandle: 'handle-1', Body: 'run-1' },
          { MessageId: 'msg-2', ReceiptHandle: 'handle-2', Body: '{"run":2}' },
        ],
      });

      const messages = await service.receiveMessages(QUEUE_URL, 2, 5);

      expect(messages).toEqual([
        { handle: 'handle-1', body: 'run-1' },
        { handle: 'handle-2', body: '{"run":2}' },
      ]);
      expect(ReceiveMessageCommand).toHaveBeenCalledWith({
        QueueUrl: QUEUE_URL,
        MaxNumberOfMessages: 2,
        WaitTimeSeconds: 5,
      });
      expect(mockDestroy).toHaveBeenCalledTimes(1);
    });

    it('should default to one message and a one second wait', async () => {
      mockSend.mockResolvedValueOnce({ Messages: [] });

      await service.receiveMessages(QUEUE_URL);

      expect(ReceiveMessageCommand).toHaveBeenCalledWith({
        QueueUrl: QUEUE_URL,
        MaxNumberOfMessages: 1,
        WaitTimeSeconds: 1,
      });
    });

    it('should return an empty list when the response has no messages', async () => {
      mockSend.mockResolvedValueOnce({ $metadata: {} });

      const messages = await service.receiveMessages(QUEUE_URL);

      expect(messages).toEqual([]);
    });

    it('should return an empty list when the queue rejects the request', async () => {
      const errorSpy = jest
        .spyOn(Logger.prototype, 'error')
        .mockImplementation(() => undefined);
      mockSend.mockRejectedValueOnce(
        new QueueDoesNotExist({
          message: 'The specified queue does not exist.',
          $metadata: {},
        }),
      );

      const messages = await service.receiveMessages(QUEUE_URL);

      expect(messages).toEqual([]);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(mockDestroy).toHaveBeenCalledTimes(1);
    });

    it('should propagate errors that do not come from the queue service', async () => {
      mockSend.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(service.receiveMessages(QUEUE_URL)).rejects.toThrow(
        'socket hang up',
      );
      expect(mockDestroy).toHaveBeenCalledTimes(1);
    });

    it('should skip messages without a receipt handle or body', async () => {
      jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
      mockSend.mockResolvedValueOnce({
        Messages: [
          { MessageId: 'msg-1', Body: 'no-handle' },
          { MessageId: 'msg-2', ReceiptHandle: 'handle-2' },
          { MessageId: 'msg-3', ReceiptHandle: 'handle-3', Body: '' },
        ],
      });

      const messages = await service.receiveMessages(QUEUE_URL, 3);

      expect(messages).toEqual([{ handle: 'handle-3', body: '' }]);
    });
  });

  describe('deleteMessage', () => {
    it('should send exactly one delete request with the given handle', async () => {
      mockSend.mockResolvedValueOnce({});

      await service.deleteMessage(QUEUE_URL, 'handle-1');

      expect(DeleteMessageCommand).toHaveBeenCalledTimes(1);
      expect(DeleteMessageCommand).toHaveBeenCalledWith({
        QueueUrl: QUEUE_URL,
        ReceiptHandle: 'handle-1',
      });
      expect(mockSend).toHaveBeenCalledTimes(1);
      expect(mockDestroy).toHaveBeenCalledTimes(1);
    });

    it('should propagate delete failures', async () => {
      mockSend.mockRejectedValueOnce(
        new QueueDoesNotExist({
          message: 'The specified queue does not exist.',
          $metadata: {},
        }),
      );

      await expect(
        service.deleteMessage(QUEUE_URL, 'handle-1'),
      ).rejects.toBeInstanceOf(QueueDoesNotExist);
      expect(mockDestroy).toHaveBeenCalledTimes(1);
    });
  });
});
