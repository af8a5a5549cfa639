/**
 * Content Checksums
 *
 * MD5 over the file's bytes, streamed so large files are never held in memory.
 * MD5 is what S3 reports as the ETag of a single-part upload.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';

export async function computeChecksum(path: string, signal?: AbortSignal): Promise<string> {
  const hash = createHash('md5');
  const stream = createReadStream(path, { signal });
  for await (const chunk of stream) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/** Hex MD5 to the base64 form S3 expects in Content-MD5 */
export function hexToBase64(hex: string): string {
  return Buffer.from(hex, 'hex').toString('base64');
}
