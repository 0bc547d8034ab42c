/**
 * Storage module - Content-addressed blob store
 */

import { env } from '../config/index.js';

import { BlobStore, type BlobStoreConfig } from './blob-store.js';

export {
  BlobStore,
  BlobStoreReader,
  BLOB_MODE,
  SHARD_PREFIX_LENGTH,
  type BlobInfo,
  type BlobStoreConfig,
  type PublishMode,
  type StoreResult
} from './blob-store.js';
export { withStagingFile, createStagingFile, randomStagingName } from './staging.js';

/**
 * Create a store rooted at `basePath`, taking unset options from the environment
 */
export function createBlobStore(
  basePath: string,
  overrides: Omit<Partial<BlobStoreConfig>, 'basePath'> = {}
): BlobStore {
  return new BlobStore({
    basePath,
    publishMode: overrides.publishMode ?? env.BLOB_STORE_PUBLISH_MODE,
    verifyStaged: overrides.verifyStaged ?? env.BLOB_STORE_VERIFY_STAGED,
    fsync: overrides.fsync ?? env.BLOB_STORE_FSYNC,
    logger: overrides.logger
  });
}
