/**
 * Hash module - SHA-256 content digests
 */

export {
  computeDigest,
  computeBufferDigest,
  validateDigest,
  isDigest,
  type Digest
} from './digest.js';
