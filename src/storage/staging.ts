/**
 * Scoped staging slots for in-flight blob writes
 *
 * A slot is a freshly created, randomly named empty file inside the store's
 * `partial/` directory. It only lives for the duration of the callback passed
 * to `withStagingFile` and is removed on every exit path.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, open, unlink } from 'node:fs/promises';
import { join } from 'node:path';

import { BlobStoreIoError, errnoCode } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';

/** 128 bits, hex-encoded to 32 characters */
const STAGING_NAME_BYTES = 16;

const MAX_CREATE_ATTEMPTS = 8;

export function randomStagingName(): string {
  return randomBytes(STAGING_NAME_BYTES).toString('hex');
}

/**
 * Create an empty staging file with a random name that did not exist before
 */
export async function createStagingFile(partialDir: string): Promise<string> {
  try {
    await mkdir(partialDir, { recursive: true });
  } catch (error) {
    throw new BlobStoreIoError('mkdir', partialDir, error);
  }

  for (let attempt = 1; ; attempt++) {
    const stagingPath = join(partialDir, randomStagingName());
    try {
      // 'wx' fails with EEXIST instead of reusing someone else's slot
      const handle = await open(stagingPath, 'wx', 0o600);
      await handle.close();
      return stagingPath;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST' && attempt < MAX_CREATE_ATTEMPTS) {
        continue;
      }
      throw new BlobStoreIoError('create-staging', stagingPath, error);
    }
  }
}

/**
 * Remove a staging file. The file may already be gone if it was renamed into place.
 */
export async function removeStagingFile(stagingPath: string): Promise<void> {
  try {
    await unlink(stagingPath);
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      throw new BlobStoreIoError('unlink', stagingPath, error);
    }
  }
}

/**
 * Run `fn` with a private staging file, removing it afterwards whether `fn`
 * resolves or rejects. When `fn` rejects, its error is rethrown and a cleanup
 * failure is only logged.
 */
export async function withStagingFile<T>(
  partialDir: string,
  logger: Logger,
  fn: (stagingPath: string) => Promise<T>
): Promise<T> {
  const stagingPath = await createStagingFile(partialDir);

  let result: T;
  try {
    result = await fn(stagingPath);
  } catch (error) {
    try {
      await removeStagingFile(stagingPath);
    } catch (cleanupError) {
      logger.warn(
        { err: cleanupError, reason: error instanceof Error ? error.message : String(error), stagingPath },
        'Failed to remove staging file'
      );
    }
    throw error;
  }

  await removeStagingFile(stagingPath);
  return result;
}
