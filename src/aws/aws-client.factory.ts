import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { S3Client } from '@aws-sdk/client-s3';
import { SQSClient } from '@aws-sdk/client-sqs';
import {
  AWS_MODULE_OPTIONS,
  AwsModuleOptions,
  AwsStaticCredentials,
} from './interfaces';

interface AwsClientConfig {
  region: string;
  endpoint?: string;
  credentials?: AwsStaticCredentials;
}

/**
 * Builds SDK clients from the module options.
 * A new client is returned on every call; callers own it and must destroy it.
 */
@Injectable()
export class AwsClientFactory {
  private readonly logger = new Logger(AwsClientFactory.name);

  constructor(
    @Inject(AWS_MODULE_OPTIONS) private readonly options: AwsModuleOptions,
  ) {
    this.ensureValidOptions(this.options);
  }

  /**
   * Create an S3 client
   * LocalStack and other custom endpoints only serve path-style requests
   */
  createS3Client(): S3Client {
    const config = this.buildClientConfig();

    this.logger.debug(`Creating S3 client for region ${config.region}`);

    return new S3Client({
      ...config,
      ...(config.endpoint ? { forcePathStyle: true } : {}),
    });
  }

  /**
   * Create an SQS client
   */
  createSqsClient(): SQSClient {
    const config = this.buildClientConfig();

    this.logger.debug(`Creating SQS client for region ${config.region}`);

    return new SQSClient(config);
  }

  private buildClientConfig(): AwsClientConfig {
    const config: AwsClientConfig = { region: this.options.region };

    if (this.options.endpoint) {
      config.endpoint = this.options.endpoint;

      if (this.options.credentials) {
        config.credentials = this.options.credentials;
      }
    }

    return config;
  }

  /**
   * Validate the module options
   * @throws BadRequestException if the options are invalid
   */
  private ensureValidOptions(options: AwsModuleOptions): void {
    if (!options.region?.trim()) {
      throw new BadRequestException('region is required for AWS configuration');
    }

    if (options.endpoint) {
      try {
        new URL(options.endpoint);
      } catch {
        throw new BadRequestException(
          `endpoint must be a valid URL: ${options.endpoint}`,
        );
      }
    }
  }
}
