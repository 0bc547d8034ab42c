/**
 * SHA-256 content digests
 *
 * A digest is the 64-character lowercase hex SHA-256 of a blob's bytes. It is
 * both the handle returned by the store and the key every lookup goes through,
 * so every path-accepting store operation runs `validateDigest` first.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import { BlobStoreIoError, InvalidDigestFormatError } from '../lib/errors.js';
import { DigestSchema, type Digest } from '../lib/validation.js';

export type { Digest } from '../lib/validation.js';

/**
 * Compute the digest of in-memory data
 */
export function computeBufferDigest(data: Buffer | string): Digest {
  return DigestSchema.parse(createHash('sha256').update(data).digest('hex'));
}

/**
 * Compute the digest of a file, streaming its contents
 */
export async function computeDigest(filePath: string): Promise<Digest> {
  const hash = createHash('sha256');

  try {
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (error) {
    throw new BlobStoreIoError('read', filePath, error);
  }

  return DigestSchema.parse(hash.digest('hex'));
}

/**
 * Check a candidate string and return it as a Digest
 *
 * @throws InvalidDigestFormatError unless the string is exactly 64 chars of [0-9a-f]
 */
export function validateDigest(candidate: string): Digest {
  const result = DigestSchema.safeParse(candidate);
  if (!result.success) {
    throw new InvalidDigestFormatError(candidate);
  }
  return result.data;
}

export function isDigest(candidate: unknown): candidate is Digest {
  return DigestSchema.safeParse(candidate).success;
}
