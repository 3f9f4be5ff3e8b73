export { default as awsConfig } from './aws.config';
export { default as artifactsConfig } from './artifacts.config';
export * from './env';
