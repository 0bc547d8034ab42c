import { describe, expect, it } from 'vitest';

import { env, parseEnv } from '../../src/config/index.js';

describe('parseEnv', () => {
  it('applies defaults to an empty environment', () => {
    const parsed = parseEnv({});

    expect(parsed).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      BLOB_STORE_PUBLISH_MODE: 'link',
      BLOB_STORE_VERIFY_STAGED: true,
      BLOB_STORE_FSYNC: true,
      isDevelopment: true,
      isProduction: false,
      isTest: false
    });
    expect(parsed.BLOB_STORE_PATH).toBeUndefined();
  });

  it('reads store settings', () => {
    const parsed = parseEnv({
      NODE_ENV: 'production',
      BLOB_STORE_PATH: '/srv/blobs',
      BLOB_STORE_PUBLISH_MODE: 'rename',
      BLOB_STORE_VERIFY_STAGED: 'false',
      BLOB_STORE_FSYNC: 'false'
    });

    expect(parsed.BLOB_STORE_PATH).toBe('/srv/blobs');
    expect(parsed.BLOB_STORE_PUBLISH_MODE).toBe('rename');
    expect(parsed.BLOB_STORE_VERIFY_STAGED).toBe(false);
    expect(parsed.BLOB_STORE_FSYNC).toBe(false);
    expect(parsed.isProduction).toBe(true);
  });

  it('lists every invalid field', () => {
    expect(() =>
      parseEnv({ BLOB_STORE_PUBLISH_MODE: 'copy', BLOB_STORE_FSYNC: 'yes' })
    ).toThrow(/Environment validation failed:\nBLOB_STORE_PUBLISH_MODE: .*\nBLOB_STORE_FSYNC: /);
  });

  it('rejects an empty store path', () => {
    expect(() => parseEnv({ BLOB_STORE_PATH: '' })).toThrow(
      'Environment validation failed:\nBLOB_STORE_PATH: BLOB_STORE_PATH must not be empty'
    );
  });
});

describe('env', () => {
  it('is parsed from the test environment', () => {
    expect(env.isTest).toBe(true);
    expect(env.LOG_LEVEL).toBe('silent');
  });
});
