import { mkdir, readdir, rm, stat, unlink } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { BlobStoreIoError } from '../../src/lib/errors.js';

import { createStagingFile, randomStagingName, withStagingFile } from '../../src/storage/staging.js';
import { createStoreRoot } from '../helpers/store-root.js';

const silent = pino({ level: 'silent' });

function recordingLogger() {
  const records: string[] = [];
  const logger = pino({ level: 'warn' }, { write: (line: string) => records.push(line) });
  return { logger, records };
}

describe('staging slots', () => {
  let root: string;
  let partialDir: string;

  beforeEach(async () => {
    root = await createStoreRoot('blob-vault-staging-');
    partialDir = join(root, 'partial');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('generates 128-bit hex names', () => {
    const name = randomStagingName();

    expect(name).toMatch(/^[0-9a-f]{32}$/);
    expect(randomStagingName()).not.toBe(name);
  });

  it('creates an empty file inside the partial directory', async () => {
    const stagingPath = await createStagingFile(partialDir);

    expect(join(partialDir, basename(stagingPath))).toBe(stagingPath);
    expect((await stat(stagingPath)).size).toBe(0);
  });

  it('removes the staging file after the scope resolves', async () => {
    let seen = '';

    const result = await withStagingFile(partialDir, silent, async stagingPath => {
      seen = stagingPath;
      expect((await stat(stagingPath)).isFile()).toBe(true);
      return 'done';
    });

    expect(result).toBe('done');
    expect(seen).not.toBe('');
    expect(await readdir(partialDir)).toEqual([]);
  });

  it('removes the staging file and rethrows when the scope fails', async () => {
    const failure = new Error('copy failed');

    await expect(
      withStagingFile(partialDir, silent, async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(await readdir(partialDir)).toEqual([]);
  });

  it('tolerates a staging file that was moved away inside the scope', async () => {
    await withStagingFile(partialDir, silent, async stagingPath => {
      await unlink(stagingPath);
    });

    expect(await readdir(partialDir)).toEqual([]);
  });

  it('logs a failed cleanup and rethrows the original error', async () => {
    const { logger, records } = recordingLogger();
    const failure = new Error('copy failed');
    let stagingPath = '';

    await expect(
      withStagingFile(partialDir, logger, async path => {
        stagingPath = path;
        // a directory in the slot makes unlink fail with EISDIR
        await unlink(path);
        await mkdir(path);
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(records).toHaveLength(1);
    expect(JSON.parse(records[0] ?? '{}')).toMatchObject({
      level: 40,
      msg: 'Failed to remove staging file',
      stagingPath,
      err: { type: 'BlobStoreIoError' },
      reason: 'copy failed'
    });
  });

  it('surfaces a failed cleanup when the scope succeeded', async () => {
    const { logger, records } = recordingLogger();

    const error = await withStagingFile(partialDir, logger, async path => {
      await unlink(path);
      await mkdir(path);
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BlobStoreIoError);
    expect(error).toMatchObject({ operation: 'unlink' });
    expect(records).toEqual([]);
  });
});
