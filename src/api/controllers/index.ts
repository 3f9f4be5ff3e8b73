export * from './queue.controller';
export * from './artifacts.controller';
