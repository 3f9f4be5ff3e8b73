import { relative, sep } from 'path';

/**
 * Object key for a file: its path relative to the uploaded root, with `/` separators
 */
export function toObjectKey(root: string, filePath: string): string {
  return relative(root, filePath).split(sep).join('/');
}

export function formatObjectUri(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}
