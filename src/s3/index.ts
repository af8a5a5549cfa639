/**
 * Object Store Module
 *
 * Re-exports the object store capability and its S3 implementation.
 */

export { S3ObjectStore, type S3StoreOptions } from './client.js';
export type { ObjectStoreClient, PutMetadata, PutResult } from './types.js';
export { buildRemoteKey } from './utils.js';
