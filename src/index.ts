export {
  BlobStore,
  BlobStoreReader,
  createBlobStore,
  BLOB_MODE,
  SHARD_PREFIX_LENGTH,
  type BlobInfo,
  type BlobStoreConfig,
  type PublishMode,
  type StoreResult
} from './storage/index.js';
export { computeDigest, computeBufferDigest, validateDigest, isDigest, type Digest } from './hash/index.js';
export {
  BlobStoreError,
  InvalidDigestFormatError,
  InvalidStoreRootError,
  BlobStoreIoError,
  BlobIntegrityError,
  NotImplementedError,
  type BlobStoreErrorCode,
  type BlobStoreOperation
} from './lib/errors.js';
export { env, parseEnv, type AppEnvironment } from './config/index.js';
export { logger } from './lib/logger.js';
