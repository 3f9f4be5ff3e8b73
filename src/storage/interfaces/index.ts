export * from './artifact-upload-config.interface';
