export * from './interfaces';
export * from './utils';
export * from './artifact-storage.service';
