/**
 * Content-Addressed Blob Store
 *
 * Files are stored immutably under the SHA-256 digest of their contents.
 * Digests are sharded on their first 3 hex characters to keep directory
 * fan-out bounded.
 *
 * Storage Layout:
 * <root>/
 * ├── blobs/2cf/24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824   (mode 0444)
 * └── partial/<32 random hex chars>                                               (transient)
 *
 * Writes are staged under `partial/` and published with a single hard link
 * (or rename), so a blob path either does not exist or holds complete content.
 * No locks are taken: concurrent writers of the same content converge on the
 * same path and the loser of the publish race treats EEXIST as success.
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { chmod, link, mkdir, open, rename, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { pipeline } from 'node:stream/promises';

import { computeDigest, validateDigest, type Digest } from '../hash/index.js';
import {
  BlobIntegrityError,
  BlobStoreIoError,
  InvalidStoreRootError,
  NotImplementedError,
  errnoCode
} from '../lib/errors.js';
import { logger as defaultLogger, type Logger } from '../lib/logger.js';
import { StoreRootSchema } from '../lib/validation.js';

import { withStagingFile } from './staging.js';

/** Length of the shard directory name taken from the front of a digest */
export const SHARD_PREFIX_LENGTH = 3;

/** Published blobs are read-only for every principal (-r--r--r--) */
export const BLOB_MODE = 0o444;

/**
 * How a staged file becomes visible at its blob path
 * - link: hard link, requires `partial/` and `blobs/` on the same volume
 * - rename: atomic rename, for environments where hard links are unavailable
 */
export type PublishMode = 'link' | 'rename';

/**
 * Configuration for the blob store
 */
export interface BlobStoreConfig {
  /** Store root containing `blobs/` and `partial/` */
  basePath: string;
  /** Publish primitive (default: link) */
  publishMode?: PublishMode;
  /** Re-hash the staged copy before publishing (default: true) */
  verifyStaged?: boolean;
  /** fsync the staged copy before publishing (default: true) */
  fsync?: boolean;
  logger?: Logger;
}

/**
 * Result of storing a file
 */
export interface StoreResult {
  /** SHA-256 digest (content address) */
  digest: Digest;
  /** Canonical path of the published blob */
  path: string;
  /** Whether this call published the blob (false if deduplicated) */
  isNew: boolean;
}

/**
 * Description of a published blob
 */
export interface BlobInfo {
  digest: Digest;
  path: string;
  /** Size in bytes */
  size: number;
}

/**
 * Read-only view of a blob store
 */
export class BlobStoreReader {
  protected readonly basePath: string;

  constructor(basePath: string) {
    const result = StoreRootSchema.safeParse(basePath);
    if (!result.success) {
      throw new InvalidStoreRootError(basePath, result.error.issues.map(issue => issue.message).join(', '));
    }
    this.basePath = result.data;
  }

  get root(): string {
    return this.basePath;
  }

  public blobDir(): string {
    return join(this.basePath, 'blobs');
  }

  public partialDir(): string {
    return join(this.basePath, 'partial');
  }

  /**
   * Canonical path for a digest: <blobDir>/<first 3 chars>/<remaining 61 chars>
   *
   * @throws InvalidDigestFormatError
   */
  public blobPath(digest: string): string {
    const valid = validateDigest(digest);
    return join(
      this.blobDir(),
      valid.slice(0, SHARD_PREFIX_LENGTH),
      valid.slice(SHARD_PREFIX_LENGTH)
    );
  }

  /**
   * Whether a regular file is published for this digest. Never reads content.
   */
  public async exists(digest: string): Promise<boolean> {
    return (await this.statBlobPath(this.blobPath(digest))) !== null;
  }

  /**
   * Re-hash the stored blob and compare it with its digest.
   * O(blob size): an audit operation, not a hot-path check.
   */
  public async verify(digest: string): Promise<boolean> {
    const valid = validateDigest(digest);
    const path = this.blobPath(valid);

    if ((await this.statBlobPath(path)) === null) {
      return false;
    }

    const observed = await computeDigest(path);
    return observed === valid;
  }

  public async stat(digest: string): Promise<BlobInfo | null> {
    const valid = validateDigest(digest);
    const path = this.blobPath(valid);
    const stats = await this.statBlobPath(path);

    return stats === null ? null : { digest: valid, path, size: stats.size };
  }

  /**
   * Stat a blob path, returning null unless a regular file is there
   */
  protected async statBlobPath(path: string): Promise<{ size: number } | null> {
    try {
      const stats = await stat(path);
      return stats.isFile() ? stats : null;
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return null;
      }
      throw new BlobStoreIoError('stat', path, error);
    }
  }
}

/**
 * Read-write blob store
 */
export class BlobStore extends BlobStoreReader {
  private readonly publishMode: PublishMode;
  private readonly verifyStaged: boolean;
  private readonly fsync: boolean;
  private readonly logger: Logger;

  constructor(config: BlobStoreConfig) {
    super(config.basePath);
    this.publishMode = config.publishMode ?? 'link';
    this.verifyStaged = config.verifyStaged ?? true;
    this.fsync = config.fsync ?? true;
    this.logger = (config.logger ?? defaultLogger).child({ store: this.basePath });
  }

  /**
   * Store a file and return its digest
   */
  public async store(sourcePath: string): Promise<Digest> {
    const { digest } = await this.put(sourcePath);
    return digest;
  }

  /**
   * Store a file, reporting whether this call published it
   *
   * @param sourcePath - File whose bytes are stored. Only content is copied, never metadata.
   */
  public async put(sourcePath: string): Promise<StoreResult> {
    const digest = await computeDigest(sourcePath);
    const blobPath = this.blobPath(digest);

    if (await this.exists(digest)) {
      this.logger.debug({ digest }, 'Blob already stored');
      return { digest, path: blobPath, isNew: false };
    }

    const blobParent = dirname(blobPath);
    try {
      await mkdir(blobParent, { recursive: true });
    } catch (error) {
      throw new BlobStoreIoError('mkdir', blobParent, error);
    }

    const isNew = await withStagingFile(this.partialDir(), this.logger, async stagingPath => {
      await this.copyInto(sourcePath, stagingPath);

      if (this.verifyStaged) {
        const staged = await computeDigest(stagingPath);
        if (staged !== digest) {
          throw new BlobIntegrityError(digest, staged, sourcePath);
        }
      }

      try {
        await chmod(stagingPath, BLOB_MODE);
      } catch (error) {
        throw new BlobStoreIoError('chmod', stagingPath, error);
      }

      return this.publish(stagingPath, blobPath);
    });

    this.logger.debug({ digest, isNew }, isNew ? 'Published blob' : 'Blob published concurrently');
    return { digest, path: blobPath, isNew };
  }

  /**
   * Garbage collection is not supported.
   */
  public async clean(): Promise<never> {
    throw new NotImplementedError('clean');
  }

  private async copyInto(sourcePath: string, stagingPath: string): Promise<void> {
    try {
      await pipeline(createReadStream(sourcePath), createWriteStream(stagingPath));
    } catch (error) {
      throw new BlobStoreIoError('copy', stagingPath, error);
    }

    if (!this.fsync) {
      return;
    }

    try {
      const handle = await open(stagingPath, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      throw new BlobStoreIoError('fsync', stagingPath, error);
    }
  }

  /**
   * Make the staged file visible at its blob path.
   * Returns false when another writer published the same content first.
   */
  private async publish(stagingPath: string, blobPath: string): Promise<boolean> {
    if (this.publishMode === 'rename') {
      // rename replaces an existing target, so a blob already in place wins.
      // Two writers can still both pass this check before either renames; the
      // later rename then swaps in identical bytes.
      if ((await this.statBlobPath(blobPath)) !== null) {
        return false;
      }
      try {
        await rename(stagingPath, blobPath);
        return true;
      } catch (error) {
        throw new BlobStoreIoError('rename', blobPath, error);
      }
    }

    try {
      await link(stagingPath, blobPath);
      return true;
    } catch (error) {
      // Only a published regular file makes EEXIST a lost race
      if (errnoCode(error) === 'EEXIST' && (await this.statBlobPath(blobPath)) !== null) {
        return false;
      }
      throw new BlobStoreIoError('link', blobPath, error);
    }
  }
}
