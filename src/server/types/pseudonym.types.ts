/**
 * TypeScript type definitions for the pseudonym allocation engine.
 * These types describe name-part configuration, the index space built from
 * it, and the values callers pass in as keys.
 */

/**
 * A named, ordered list of words that contributes one word to every pseudonym.
 *
 * @example
 * { name: "adjectives", words: ["Big", "Blue"] }
 */
export interface NamePart {
  /** Category name (e.g., "adjectives") */
  name: string;
  /** Words in this category, in the order positions refer to */
  words: string[];
}

/**
 * Root structure of a versioned name-parts file such as data/name-parts.json.
 *
 * @example
 * {
 *   version: "v1",
 *   parts: { adjectives: ["Big"], animals: ["Bear"] }
 * }
 */
export interface NamePartsFile {
  version: string;
  parts: Record<string, string[]>;
}

/**
 * 1-based position of one pseudonym in the cartesian product of all categories.
 */
export type LinearIndex = number;

/**
 * One 1-based word position per category, in category order.
 */
export type Subscript = number[];

/**
 * Source of uniform floats in [0, 1). The PRNG service implements this.
 */
export interface RandomSource {
  nextFloat(): number;
}

/**
 * A single cell of a key column. Rows of these are reduced to fingerprints.
 */
export type KeyValue = string | number | bigint | boolean | null | Date;

/**
 * Registry entry as exposed for inspection.
 */
export interface RegistryEntry {
  /** Fingerprint of the key row */
  fingerprint: string;
  /** Pseudonym assigned to it */
  pseudonym: string;
}

/**
 * Usage summary of an allocation engine.
 */
export interface PseudonymSummary {
  /** Whether alliterations are issued by default */
  alliterate: boolean;
  /** Registered keys */
  used: number;
  /** Size of the full name space */
  total: number;
  /** Registered keys whose pseudonym is an alliteration */
  usedAlliterations: number;
  /** Number of alliterations in the name space */
  totalAlliterations: number;
  /** used / total in percent, 0 for an empty space */
  percentUsed: number;
  /** usedAlliterations / totalAlliterations in percent, 0 when there are none */
  percentAlliterationsUsed: number;
}
