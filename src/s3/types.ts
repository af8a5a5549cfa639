/**
 * Object Store - Shared Types
 *
 * The engine depends only on ObjectStoreClient. Authentication, endpoints and
 * transport-level retries belong to the implementation.
 */

export interface PutMetadata {
  checksum: string; // Locally computed hex MD5
  size: number;
  modifiedAt: number;
  signal?: AbortSignal;
}

export interface PutResult {
  checksum: string; // Checksum the store confirmed for the stored object
}

export interface ObjectStoreClient {
  /**
   * Upload a local file. Resolves with the store-confirmed checksum; rejects
   * with TransientStoreError, PersistentStoreError or ChecksumMismatchError.
   */
  put(localPath: string, remoteKey: string, metadata: PutMetadata): Promise<PutResult>;

  /**
   * Whether the object at remoteKey already holds content with this MD5.
   * A missing object is false; other failures reject like put.
   */
  exists(remoteKey: string, checksum: string, signal?: AbortSignal): Promise<boolean>;

  /** Delete a remote object. Deleting a missing object succeeds. */
  delete(remoteKey: string): Promise<void>;
}
