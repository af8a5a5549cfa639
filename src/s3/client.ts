/**
 * Object Store - S3 Client
 *
 * Uploads files to S3 (or any S3-compatible endpoint) with MD5 verification.
 * - Small files: single PutObject with Content-MD5; the ETag is the confirmed checksum.
 * - Large files: multipart upload, confirmed by the md5-checksum user metadata.
 */

import { createReadStream } from 'fs';
import { open } from 'fs/promises';
import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  UploadPartCommand,
  type CompletedPart,
  type HeadObjectCommandOutput,
  type PutObjectCommandOutput,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import {
  ChecksumMismatchError,
  PersistentStoreError,
  SyncError,
  TransientStoreError,
  getErrorCode,
  getErrorMessage,
} from '../errors.js';
import { logger } from '../logger.js';
import { MULTIPART_PART_SIZE_BYTES, MULTIPART_THRESHOLD_BYTES } from '../sync/constants.js';
import { hexToBase64 } from '../sync/checksum.js';
import type { ObjectStoreClient, PutMetadata, PutResult } from './types.js';
import { MD5_HEX, buildObjectMetadata, normalizeEtag } from './utils.js';

// ============================================================================
// Types
// ============================================================================

export interface S3StoreOptions {
  bucket: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  multipartThresholdBytes?: number;
  partSizeBytes?: number;
  /** Injected client (tests, custom middleware) */
  client?: S3Client;
}

// ============================================================================
// Error Classification
// ============================================================================

/** S3 error names that will not succeed on retry */
const PERSISTENT_ERROR_NAMES = new Set([
  'AccessDenied',
  'AllAccessDisabled',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'NoSuchBucket',
  'InvalidBucketName',
  'AccountProblem',
  'InvalidObjectState',
  'EntityTooLarge',
  'KeyTooLongError',
  'MetadataTooLarge',
]);

const DIGEST_ERROR_NAMES = new Set(['BadDigest', 'InvalidDigest']);

/** Local file errors pass through untouched so the scheduler can classify them */
const LOCAL_ERROR_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM', 'EISDIR']);

/**
 * Map an error thrown by the SDK (or the local read feeding it) onto the
 * store error taxonomy.
 */
export function classifyS3Error(error: unknown, expectedChecksum?: string): Error {
  if (error instanceof SyncError) return error;
  if (error instanceof Error && error.name === 'AbortError') return error;

  const code = getErrorCode(error);
  if (code && LOCAL_ERROR_CODES.has(code) && error instanceof Error) return error;

  if (error instanceof S3ServiceException) {
    const status = error.$metadata.httpStatusCode;

    if (DIGEST_ERROR_NAMES.has(error.name)) {
      return new ChecksumMismatchError(expectedChecksum ?? 'unknown', `rejected (${error.name})`);
    }

    const clientFault =
      status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429;
    if (PERSISTENT_ERROR_NAMES.has(error.name) || clientFault) {
      return new PersistentStoreError(`${error.name}: ${error.message}`, { cause: error });
    }

    return new TransientStoreError(`${error.name}: ${error.message}`, { cause: error });
  }

  return new TransientStoreError(getErrorMessage(error), { cause: error });
}

// ============================================================================
// S3 Object Store
// ============================================================================

export class S3ObjectStore implements ObjectStoreClient {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly multipartThreshold: number;
  private readonly partSize: number;

  constructor(options: S3StoreOptions) {
    this.bucket = options.bucket;
    this.multipartThreshold = options.multipartThresholdBytes ?? MULTIPART_THRESHOLD_BYTES;
    this.partSize = options.partSizeBytes ?? MULTIPART_PART_SIZE_BYTES;
    this.client =
      options.client ??
      new S3Client({
        region: options.region,
        endpoint: options.endpoint,
        forcePathStyle: options.forcePathStyle,
      });
  }

  /**
   * Check the bucket is reachable with the current credentials.
   */
  async verifyBucket(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      logger.info(`Object store ready: s3://${this.bucket}`);
    } catch (error) {
      throw classifyS3Error(error);
    }
  }

  async put(localPath: string, remoteKey: string, metadata: PutMetadata): Promise<PutResult> {
    try {
      if (metadata.size > this.multipartThreshold) {
        return await this.putMultipart(localPath, remoteKey, metadata);
      }
      return await this.putSingle(localPath, remoteKey, metadata);
    } catch (error) {
      throw classifyS3Error(error, metadata.checksum);
    }
  }

  async exists(remoteKey: string, checksum: string, signal?: AbortSignal): Promise<boolean> {
    let head: HeadObjectCommandOutput;
    try {
      head = await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: remoteKey }),
        { abortSignal: signal }
      );
    } catch (error) {
      if (isNotFound(error)) return false;
      throw classifyS3Error(error);
    }
    return storedChecksum(head) === checksum;
  }

  async delete(remoteKey: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: remoteKey }));
      logger.debug(`Deleted s3://${this.bucket}/${remoteKey}`);
    } catch (error) {
      throw classifyS3Error(error);
    }
  }

  close(): void {
    this.client.destroy();
  }

  // ==========================================================================
  // Upload Paths
  // ==========================================================================

  private async putSingle(
    localPath: string,
    remoteKey: string,
    metadata: PutMetadata
  ): Promise<PutResult> {
    // The SDK leaves the body open when a request fails before reading it all
    const body = createReadStream(localPath);
    let response: PutObjectCommandOutput;
    try {
      response = await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: remoteKey,
          Body: body,
          ContentLength: metadata.size,
          ContentMD5: hexToBase64(metadata.checksum),
          Metadata: buildObjectMetadata(localPath, metadata.checksum, metadata.size),
        }),
        { abortSignal: metadata.signal }
      );
    } finally {
      body.destroy();
    }

    const etag = normalizeEtag(response.ETag);
    if (etag && MD5_HEX.test(etag)) {
      return { checksum: etag };
    }

    // Encrypted objects do not expose their MD5 as the ETag
    return { checksum: await this.readConfirmedChecksum(remoteKey, metadata.signal) };
  }

  private async putMultipart(
    localPath: string,
    remoteKey: string,
    metadata: PutMetadata
  ): Promise<PutResult> {
    const created = await this.client.send(
      new CreateMultipartUploadCommand({
        Bucket: this.bucket,
        Key: remoteKey,
        Metadata: buildObjectMetadata(localPath, metadata.checksum, metadata.size),
      }),
      { abortSignal: metadata.signal }
    );
    const uploadId = created.UploadId;
    if (!uploadId) {
      throw new TransientStoreError(`No upload id returned for ${remoteKey}`);
    }

    const file = await open(localPath, 'r');
    const parts: CompletedPart[] = [];
    try {
      const buffer = Buffer.alloc(this.partSize);
      let position = 0;
      for (let partNumber = 1; ; partNumber++) {
        const { bytesRead } = await file.read(buffer, 0, this.partSize, position);
        if (bytesRead === 0) break;
        position += bytesRead;

        const body = buffer.subarray(0, bytesRead);
        const part = await this.client.send(
          new UploadPartCommand({
            Bucket: this.bucket,
            Key: remoteKey,
            UploadId: uploadId,
            PartNumber: partNumber,
            Body: body,
            ContentMD5: createHash('md5').update(body).digest('base64'),
          }),
          { abortSignal: metadata.signal }
        );
        parts.push({ ETag: part.ETag, PartNumber: partNumber });

        if (partNumber % 10 === 0) {
          logger.debug(`Uploaded ${partNumber} parts for ${localPath}`);
        }
      }

      await this.client.send(
        new CompleteMultipartUploadCommand({
          Bucket: this.bucket,
          Key: remoteKey,
          UploadId: uploadId,
          MultipartUpload: { Parts: parts },
        }),
        { abortSignal: metadata.signal }
      );
    } catch (error) {
      await this.client
        .send(
          new AbortMultipartUploadCommand({
            Bucket: this.bucket,
            Key: remoteKey,
            UploadId: uploadId,
          })
        )
        .catch((abortError: unknown) => {
          logger.warn(
            `Failed to abort multipart upload ${uploadId}: ${getErrorMessage(abortError)}`
          );
        });
      throw error;
    } finally {
      await file.close();
    }

    return { checksum: await this.readConfirmedChecksum(remoteKey, metadata.signal) };
  }

  /**
   * Read back the checksum recorded on the stored object.
   */
  private async readConfirmedChecksum(remoteKey: string, signal?: AbortSignal): Promise<string> {
    const head = await this.client.send(
      new HeadObjectCommand({ Bucket: this.bucket, Key: remoteKey }),
      { abortSignal: signal }
    );

    const checksum = storedChecksum(head);
    if (checksum) return checksum;

    throw new TransientStoreError(`Store returned no checksum for ${remoteKey}`);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * MD5 of a stored object: our md5-checksum metadata, else an ETag that is a
 * plain MD5 (multipart and encrypted objects have other ETags).
 */
function storedChecksum(head: HeadObjectCommandOutput): string | null {
  const stored = head.Metadata?.['md5-checksum'];
  if (stored) return stored.toLowerCase();

  const etag = normalizeEtag(head.ETag);
  if (etag && MD5_HEX.test(etag)) return etag;

  return null;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof S3ServiceException &&
    (error.name === 'NotFound' ||
      error.name === 'NoSuchKey' ||
      error.$metadata.httpStatusCode === 404)
  );
}
