/**
 * Hashing Utilities
 *
 * Canonical JSON and SHA-256 digests for tamper-evident outcome records.
 */

import { createHash } from 'crypto';

const NON_ASCII = /[\u007f-\uffff]/g;

/**
 * Serialize a flat record with sorted keys and no whitespace. Characters
 * outside printable ASCII are written as \uXXXX escapes.
 */
export function canonicalJson(data: Record<string, string | number | boolean | null>): string {
  const sorted: Record<string, string | number | boolean | null> = {};
  for (const key of Object.keys(data).sort()) {
    const value = data[key];
    if (value !== undefined) {
      sorted[key] = value;
    }
  }
  return JSON.stringify(sorted).replace(
    NON_ASCII,
    char => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/**
 * Full SHA-256 hex digest of a string
 */
export function sha256Hex(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}
