import { resolve } from 'path';
import { Logger } from '@nestjs/common';
import { registerAs } from '@nestjs/config';
import { ArtifactUploadConfig } from '../storage/interfaces';
import { readEnv, safeParseBoolean } from './env';

export interface ArtifactsConfig extends ArtifactUploadConfig {
  /** Absolute directory that every local path handled over HTTP must stay within */
  root: string;
}

/**
 * Configuration for artifact transfers
 * - ARTIFACTS_UPLOAD: enable uploads (true/false, defaults to false)
 * - ARTIFACTS_BUCKET: bucket receiving the artifacts
 * - ARTIFACTS_ROOT: local directory the HTTP API reads from and writes to (defaults to ./artifacts)
 * @returns ArtifactsConfig
 */
export default registerAs('artifacts', (): ArtifactsConfig => {
  const upload = safeParseBoolean(
    'ARTIFACTS_UPLOAD',
    process.env.ARTIFACTS_UPLOAD,
    false,
  );
  const bucketModelArtifacts = readEnv('ARTIFACTS_BUCKET') ?? '';
  const root = resolve(readEnv('ARTIFACTS_ROOT') ?? 'artifacts');

  if (upload && !bucketModelArtifacts) {
    Logger.warn('ARTIFACTS_UPLOAD is enabled but ARTIFACTS_BUCKET is not set.');
  }

  return { upload, bucketModelArtifacts, root };
});
