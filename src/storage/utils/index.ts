export * from './walk-directory';
export * from './object-key';
