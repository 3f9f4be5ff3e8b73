export * from './interfaces';
export * from './aws-client.factory';
export * from './aws.module';
