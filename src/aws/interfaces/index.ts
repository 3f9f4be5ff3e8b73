export * from './aws-module-options.interface';
