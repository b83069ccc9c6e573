/**
 * SHA-256 checksum utility used for cache fingerprints.
 */
import { createHash } from 'node:crypto';

/**
 * Compute a SHA-256 checksum of the given content.
 * Returns the first 16 characters of the hex digest for brevity.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/**
 * Checksum of an ordered list of parts. Parts are length-prefixed so that
 * ['ab', 'c'] and ['a', 'bc'] never collide.
 */
export function computeListChecksum(parts: readonly string[]): string {
  return computeChecksum(parts.map((part) => `${part.length}:${part}`).join('|'));
}
