/**
 * Configuration for uploading a directory of artifacts
 */
export interface ArtifactUploadConfig {
  /**
   * Upload is skipped entirely when false
   */
  upload: boolean;

  /**
   * The bucket receiving the artifacts
   */
  bucketModelArtifacts: string;
}
