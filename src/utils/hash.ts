/**
 * Hashing helpers
 */

import { createHash } from 'crypto';

/**
 * JSON serialization with object keys sorted at every depth,
 * so logically equal documents serialize identically
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'object' && val !== null && !Array.isArray(val)) {
      const source: Record<string, unknown> = { ...val };
      return Object.fromEntries(
        Object.keys(source)
          .sort()
          .map((key) => [key, source[key]])
      );
    }
    return val;
  });
}

/**
 * Hex SHA-256 digest, optionally truncated
 */
export function sha256Hex(payload: string, length?: number): string {
  const digest = createHash('sha256').update(payload).digest('hex');
  return length === undefined ? digest : digest.slice(0, length);
}
