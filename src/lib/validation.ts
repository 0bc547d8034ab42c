import { z } from 'zod';

/**
 * Validation schemas for store inputs
 */

export const DIGEST_LENGTH = 64;

export const DigestSchema = z
  .string()
  .length(DIGEST_LENGTH, 'SHA-256 digest must be 64 characters')
  .regex(/^[0-9a-f]+$/, 'SHA-256 digest must be lowercase hexadecimal')
  .brand<'Digest'>();

/** A validated 64-character lowercase hex SHA-256 digest */
export type Digest = z.infer<typeof DigestSchema>;

export const StoreRootSchema = z.string().min(1, 'Store root must not be empty');
