import { randomUUID } from 'crypto';
import { createWriteStream } from 'fs';
import { open, rename, rm } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { Injectable, Logger } from '@nestjs/common';
import { GetObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import { AwsClientFactory } from '../aws/aws-client.factory';
import { ArtifactUploadConfig } from './interfaces';
import { formatObjectUri, toObjectKey, walkDirectory } from './utils';

/**
 * Artifact Storage Service
 *
 * Moves experiment artifacts between the local filesystem and S3.
 * Every call creates its own S3 client and destroys it before returning.
 */
@Injectable()
export class ArtifactStorageService {
  private readonly logger = new Logger(ArtifactStorageService.name);

  constructor(private readonly clientFactory: AwsClientFactory) {}

  /**
   * Upload every file below a directory, keyed by its path relative to that directory
   *
   * @param artifactsDir - Directory containing the artifacts of an experiment
   * @param config - Upload flag and target bucket
   * @returns The S3 URI of each uploaded file, or an empty list if any upload failed
   */
  async uploadArtifacts(
    artifactsDir: string,
    config: ArtifactUploadConfig,
  ): Promise<string[]> {
    if (!config.upload) {
      this.logger.log('Upload is disabled in the configuration.');

      return [];
    }

    const bucket = config.bucketModelArtifacts;

    if (!bucket) {
      this.logger.error('No bucket configured for artifact upload.');

      return [];
    }

    const client = this.clientFactory.createS3Client();
    const uploadedUris: string[] = [];

    try {
      const files = walkDirectory(artifactsDir, {
        onError: (error, directory) =>
          this.logger.warn(
            `Skipping unreadable directory ${directory}: ${describeError(error)}`,
          ),
      });

      for await (const filePath of files) {
        const key = toObjectKey(artifactsDir, filePath);
        // read errors propagate; only SDK failures are absorbed
        const file = await open(filePath, 'r');

        try {
          const { size } = await file.stat();
          const body = file.createReadStream({ autoClose: false });

          try {
            await client.send(
              new PutObjectCommand({
                Bucket: bucket,
                Key: key,
                Body: body,
                ContentLength: size,
              }),
            );
          } catch (error) {
            this.logger.error(
              `Failed to upload files: ${describeError(error)}`,
            );

            return [];
          } finally {
            body.destroy();
          }
        } finally {
          await file.close();
        }

        const uploadedUri = formatObjectUri(bucket, key);
        uploadedUris.push(uploadedUri);

        this.logger.debug(`Uploaded ${filePath} to ${uploadedUri}`);
      }
    } finally {
      client.destroy();
    }

    this.logger.log('All files have been uploaded successfully.');

    return uploadedUris;
  }

  /**
   * Download a single object to a local file
   * Failures are logged, never thrown
   *
   * @param bucket - The name of the bucket
   * @param key - The key of the object to download
   * @param localFile - Where the object is saved
   */
  async downloadObject(
    bucket: string,
    key: string,
    localFile: string,
  ): Promise<void> {
    const client = this.clientFactory.createS3Client();
    // the body lands beside the destination and is renamed into place once complete
    const tempFile = `${localFile}.${randomUUID().slice(0, 8)}.part`;

    try {
      const response = await client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key }),
      );

      if (!(response.Body instanceof Readable)) {
        throw new Error(`Object ${key} in ${bucket} has no readable body`);
      }

      await pipeline(response.Body, createWriteStream(tempFile));
      await rename(tempFile, localFile);

      this.logger.log(
        `Download successful. File downloaded from bucket '${bucket}' with key '${key}' to '${localFile}'.`,
      );
    } catch (error) {
      this.logger.error(`Download failed. Exception: ${describeError(error)}`);

      await rm(tempFile, { force: true });
    } finally {
      client.destroy();
    }
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
