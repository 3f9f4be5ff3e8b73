import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';

/**
 * Static credentials, only used together with a custom endpoint
 */
export interface AwsStaticCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

/**
 * Options for configuring the AWS module
 */
export interface AwsModuleOptions {
  /**
   * Region used by every client the module creates
   */
  region: string;

  /**
   * Endpoint URL (useful for local development with LocalStack)
   */
  endpoint?: string;

  /**
   * Credentials for the custom endpoint; the default provider chain is used otherwise
   */
  credentials?: AwsStaticCredentials;

  /**
   * Whether to register the module globally
   */
  global?: boolean;
}

/**
 * Factory interface for async module configuration
 */
export interface AwsModuleOptionsFactory {
  createAwsModuleOptions(): Promise<AwsModuleOptions> | AwsModuleOptions;
}

/**
 * Async options for configuring the AWS module
 */
export interface AwsModuleAsyncOptions extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Whether to make the module global
   */
  isGlobal?: boolean;

  /**
   * Use an existing provider
   */
  useExisting?: Type<AwsModuleOptionsFactory>;

  /**
   * Use a class as the factory
   */
  useClass?: Type<AwsModuleOptionsFactory>;

  /**
   * Use a factory function
   */
  useFactory?: (...args: any[]) => Promise<AwsModuleOptions> | AwsModuleOptions;

  /**
   * Inject dependencies into the factory
   */
  inject?: (InjectionToken | OptionalFactoryDependency)[];
}

/**
 * Injection token for AWS module options
 */
export const AWS_MODULE_OPTIONS = Symbol('AWS_MODULE_OPTIONS');
