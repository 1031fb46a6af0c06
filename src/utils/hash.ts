/**
 * SHA-256 Hash Utilities
 *
 * Content hashes recorded next to every written document so a packaged
 * dataset can be checked for drift. Format: 'sha256:' + 64 lowercase hex.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

export const HASH_PREFIX = 'sha256:';

/**
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}
