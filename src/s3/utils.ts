/**
 * Object Store - Key and Metadata Helpers
 */

import { basename, relative, sep } from 'path';

/** Characters S3 allows in user metadata without escaping */
const ASCII_PRINTABLE = /^[\x20-\x7e]*$/;

export const MD5_HEX = /^[0-9a-f]{32}$/;

/**
 * Build the remote key for a file: <prefix>/<root folder name>/<relative path>.
 * Always uses / separators and never starts with one.
 */
export function buildRemoteKey(prefix: string, root: string, localPath: string): string {
  const relativePath = relative(root, localPath).split(sep).join('/');
  const parts = [prefix.replace(/^\/+|\/+$/g, ''), basename(root), relativePath];
  return parts.filter((part) => part.length > 0).join('/');
}

/**
 * Encode a metadata value to be S3-safe (ASCII only).
 * Non-ASCII values are base64 encoded behind a `base64:` marker.
 */
export function encodeMetadataValue(value: string): string {
  if (ASCII_PRINTABLE.test(value)) return value;
  return `base64:${Buffer.from(value, 'utf-8').toString('base64')}`;
}

/** Strip the quotes S3 puts around ETags */
export function normalizeEtag(etag: string | undefined): string | undefined {
  return etag?.replace(/^"|"$/g, '').toLowerCase();
}

export function buildObjectMetadata(
  localPath: string,
  checksum: string,
  size: number
): Record<string, string> {
  return {
    'md5-checksum': checksum,
    'original-path': encodeMetadataValue(localPath),
    'file-size': String(size),
  };
}
