export * from './queue-message.interface';
