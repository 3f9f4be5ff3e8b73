export * from './receive.message.dto';
export * from './delete.message.dto';
