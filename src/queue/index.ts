export * from './interfaces';
export * from './queue.service';
