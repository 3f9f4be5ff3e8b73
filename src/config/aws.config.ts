import { registerAs } from '@nestjs/config';
import { AwsModuleOptions } from '../aws/interfaces';
import { readEnv } from './env';

/**
 * Configuration for the AWS module
 * - AWS_REGION: region for every client (defaults to eu-west-1)
 * - AWS_ENDPOINT_URL: custom endpoint, e.g. LocalStack
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY: only read alongside a custom
 *   endpoint; real AWS uses the SDK's default credential chain
 * @returns AwsModuleOptions
 */
export default registerAs('aws', (): AwsModuleOptions => {
  const endpoint = readEnv('AWS_ENDPOINT_URL');

  return {
    region: readEnv('AWS_REGION') ?? 'eu-west-1',
    endpoint,
    credentials: endpoint
      ? {
          accessKeyId: readEnv('AWS_ACCESS_KEY_ID') ?? 'localstack',
          secretAccessKey: readEnv('AWS_SECRET_ACCESS_KEY') ?? 'localstack',
        }
      : undefined,
    global: true,
  };
});
