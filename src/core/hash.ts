/**
 * Hashing utilities
 *
 * Uses js-sha256 for a pure JavaScript SHA-256 implementation.
 */

import { sha256 } from 'js-sha256';

/**
 * Compute a short hash (first 8 characters) for display/debugging
 */
export function shortHash(str: string): string {
  return sha256(str).substring(0, 8);
}

/**
 * Stable decimal identifier derived from content.
 *
 * Revision ids in WordprocessingML are decimal numbers, so the first 28 bits
 * of the digest are used (always below 2^31).
 */
export function numericContentId(content: string): string {
  return String(parseInt(sha256(content).substring(0, 7), 16));
}
