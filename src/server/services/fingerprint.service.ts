/**
 * Fingerprint Service for Key Row Hashing
 *
 * Reduces a row of key values to a fixed-length SHA256 digest that the
 * allocation engine uses as its registry key. Hashing is deterministic:
 * the same row always produces the same fingerprint.
 *
 * Values are serialized with a type tag before hashing, so the number 1,
 * the bigint 1n and the string "1" are different keys.
 *
 * An optional pepper is appended to the serialized row. Without a pepper,
 * fingerprints of guessable keys can be recomputed by anyone.
 */

import crypto from 'crypto';
import type { KeyValue } from '../types/pseudonym.types.js';

const HASH_ALGORITHM = 'sha256';
const HASH_ENCODING = 'hex';
export const FINGERPRINT_LENGTH = 64;
export const MIN_PEPPER_LENGTH = 16;

/**
 * Serializes one value with a type tag.
 *
 * @example
 * ```typescript
 * serializeValue('1'); // 's:"1"'
 * serializeValue(1);   // 'n:1'
 * serializeValue(1n);  // 'b:1'
 * ```
 */
export function serializeValue(value: KeyValue): string {
  if (value === null) return 'z:null';
  if (value instanceof Date) return `d:${value.getTime()}`;

  switch (typeof value) {
    case 'string':
      return `s:${JSON.stringify(value)}`;
    case 'number':
      // String() keeps NaN and the infinities distinct; -0 folds into 0
      return `n:${String(value)}`;
    case 'bigint':
      return `b:${value.toString()}`;
    default:
      return `t:${value}`;
  }
}

/**
 * Serializes a row as a bracketed list of tagged values.
 */
export function serializeRow(values: readonly KeyValue[]): string {
  return `[${values.map(serializeValue).join(',')}]`;
}

/**
 * FingerprintService computes registry keys for rows of key values.
 *
 * @example
 * ```typescript
 * const service = new FingerprintService();
 * const fp = service.fingerprintRow(['alice', 42]);
 * // Returns: "5f1c..." (64-character hex string)
 * ```
 */
export class FingerprintService {
  private readonly pepper: string;

  /**
   * @param pepper - Optional secret appended before hashing
   * @throws {Error} If a pepper is given but shorter than MIN_PEPPER_LENGTH
   */
  constructor(pepper?: string) {
    this.pepper = pepper ?? '';

    if (this.pepper.length > 0 && this.pepper.length < MIN_PEPPER_LENGTH) {
      throw new Error(
        `Fingerprint pepper must be at least ${MIN_PEPPER_LENGTH} characters long.`
      );
    }
  }

  /**
   * SHA256 hex digest of a serialized row (64 characters).
   */
  fingerprintRow(values: readonly KeyValue[]): string {
    return crypto
      .createHash(HASH_ALGORITHM)
      .update(serializeRow(values) + this.pepper)
      .digest(HASH_ENCODING);
  }

  /**
   * Fingerprints for each row of a set of equal-length columns.
   * Column lengths are assumed to have been checked by the caller.
   */
  fingerprintColumns(columns: readonly (readonly KeyValue[])[]): string[] {
    const rows = columns.length === 0 ? 0 : columns[0].length;
    const fingerprints = new Array<string>(rows);
    for (let row = 0; row < rows; row++) {
      fingerprints[row] = this.fingerprintRow(columns.map((column) => column[row]));
    }
    return fingerprints;
  }
}
