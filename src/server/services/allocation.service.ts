/**
 * Allocation Engine - Issues each fingerprint exactly one, never-repeated pseudonym.
 *
 * The engine owns two permutation pools over overlapping index sets:
 * - the full pool, a shuffle of every index in the name space
 * - the alliteration pool, a shuffle of the alliterating subset
 *
 * A request draws from one of them and removes the drawn indices from the
 * other, so an index issued through either pool is gone from both. The
 * registry maps fingerprints to pseudonyms; it only grows.
 *
 * Allocation Flow:
 * 1. Split keys into registered ones and new, deduplicated ones
 * 2. Draw one index per new fingerprint from the selected pool
 * 3. Remove the same indices from the sibling pool
 * 4. Decode indices to subscripts and join the words
 * 5. Register new fingerprints in draw order
 * 6. Answer every key, in input order, from the registry
 *
 * Steps 2 and 3 form one transaction: draw() either succeeds or throws
 * without touching state, and nothing after it can fail for a valid index.
 *
 * @example
 * ```typescript
 * const engine = new AllocationEngine({
 *   nameSpace: new NameSpace([
 *     { name: 'adjectives', words: ['Big', 'Blue'] },
 *     { name: 'animals', words: ['Bear', 'Bat'] },
 *   ]),
 *   random: new PRNG(42n),
 * });
 *
 * engine.pseudonymize(['fp-a', 'fp-b', 'fp-a']);
 * // e.g. ['Blue Bear', 'Big Bat', 'Blue Bear']
 * ```
 */

import type {
  LinearIndex,
  RandomSource,
  RegistryEntry,
} from '../types/pseudonym.types.js';
import {
  CapacityExhaustedError,
  InsufficientCapacityError,
} from '../utils/errors.js';
import { findAlliterations } from './alliteration.service.js';
import type { NameSpace } from './name-space.service.js';
import { PermutationPool } from './permutation-pool.service.js';
import { SubscriptCodec } from './subscript-codec.service.js';

export const DEFAULT_SEPARATOR = ' ';

/**
 * Check if debug logging is enabled via DEBUG_PSEUDONYMS environment variable.
 */
function isDebugEnabled(): boolean {
  return process.env.DEBUG_PSEUDONYMS === 'true';
}

/**
 * Shortens a fingerprint for logging (first 8 characters).
 */
export function fingerprintPreview(fingerprint: string): string {
  return fingerprint.substring(0, 8) + '...';
}

export interface AllocationEngineOptions {
  nameSpace: NameSpace;
  random: RandomSource;
  /** Issue alliterations when a call does not say (default: false) */
  alliterate?: boolean;
  /** Placed between the words of a pseudonym (default: single space) */
  separator?: string;
}

export class AllocationEngine {
  private readonly nameSpace: NameSpace;
  private readonly codec: SubscriptCodec;
  private readonly fullPool: PermutationPool;
  private readonly alliterationPool: PermutationPool;
  private readonly registry = new Map<string, string>();
  private readonly defaultAlliterate: boolean;
  private readonly separator: string;

  constructor(options: AllocationEngineOptions) {
    this.nameSpace = options.nameSpace;
    this.codec = new SubscriptCodec(this.nameSpace.sizes());
    this.defaultAlliterate = options.alliterate ?? false;
    this.separator = options.separator ?? DEFAULT_SEPARATOR;

    this.fullPool = PermutationPool.fromRange(this.nameSpace.total(), options.random);
    this.alliterationPool = PermutationPool.fromIndices(
      findAlliterations(this.nameSpace, this.codec),
      options.random
    );

    if (isDebugEnabled()) {
      console.log(
        JSON.stringify({
          debug: 'AllocationEngine:init',
          sizes: this.nameSpace.sizes(),
          total: this.fullPool.size(),
          alliterations: this.alliterationPool.size(),
          alliterate: this.defaultAlliterate,
          timestamp: new Date().toISOString(),
        })
      );
    }
  }

  /**
   * Pseudonyms for a batch of fingerprints, in input order.
   *
   * Registered fingerprints get their stored pseudonym back. Each distinct new
   * fingerprint consumes one unused pseudonym, shared by all its occurrences.
   *
   * @param fingerprints - Opaque, deterministic key digests
   * @param alliterate - Draw new pseudonyms from the alliterations only
   *   (default: the engine's setting). Never falls back to the full pool.
   * @throws {CapacityExhaustedError} If the selected pool cannot cover the new
   *   fingerprints; engine state is unchanged
   */
  pseudonymize(fingerprints: readonly string[], alliterate?: boolean): string[] {
    const useAlliterations = alliterate ?? this.defaultAlliterate;

    const fresh = [...new Set(fingerprints)].filter(
      (fingerprint) => !this.registry.has(fingerprint)
    );

    if (fresh.length > 0) {
      const pseudonyms = this.allocate(fresh.length, useAlliterations);
      fresh.forEach((fingerprint, i) => {
        this.registry.set(fingerprint, pseudonyms[i]);
      });

      if (isDebugEnabled()) {
        console.log(
          JSON.stringify({
            debug: 'AllocationEngine:pseudonymize',
            requested: fingerprints.length,
            issued: fresh.length,
            alliterate: useAlliterations,
            remainingTotal: this.fullPool.remaining(),
            remainingAlliterations: this.alliterationPool.remaining(),
            timestamp: new Date().toISOString(),
          })
        );
      }
    }

    return fingerprints.map((fingerprint) => this.lookupOrFail(fingerprint));
  }

  /**
   * Draws n indices from the selected pool, retires them from the sibling
   * pool, and turns them into pseudonyms.
   */
  private allocate(n: number, alliterate: boolean): string[] {
    const [source, sibling] = alliterate
      ? [this.alliterationPool, this.fullPool]
      : [this.fullPool, this.alliterationPool];

    let drawn: LinearIndex[];
    try {
      drawn = source.draw(n);
    } catch (error) {
      if (!(error instanceof InsufficientCapacityError)) {
        throw error;
      }
      const exhausted = new CapacityExhaustedError({
        requested: n,
        remainingTotal: this.fullPool.remaining(),
        remainingAlliterations: this.alliterationPool.remaining(),
        alliterate,
      });
      console.error(
        JSON.stringify({
          operation: 'pseudonymize',
          error: exhausted.message,
          requested: exhausted.requested,
          remainingTotal: exhausted.remainingTotal,
          remainingAlliterations: exhausted.remainingAlliterations,
          alliterate,
          timestamp: new Date().toISOString(),
        })
      );
      throw exhausted;
    }

    sibling.remove(drawn);
    return drawn.map((index) => this.indexToPseudonym(index));
  }

  private indexToPseudonym(index: LinearIndex): string {
    return this.nameSpace.wordsFor(this.codec.decode(index)).join(this.separator);
  }

  private lookupOrFail(fingerprint: string): string {
    const pseudonym = this.registry.get(fingerprint);
    if (pseudonym === undefined) {
      throw new Error(`No pseudonym registered for ${fingerprintPreview(fingerprint)}`);
    }
    return pseudonym;
  }

  /**
   * Stored pseudonym for a fingerprint, if any.
   */
  lookup(fingerprint: string): string | undefined {
    return this.registry.get(fingerprint);
  }

  /**
   * Number of registered fingerprints.
   */
  size(): number {
    return this.registry.size;
  }

  /**
   * Number of registered fingerprints whose pseudonym is an alliteration,
   * whether or not alliteration was requested for them.
   */
  alliterationCount(): number {
    return this.alliterationPool.size() - this.alliterationPool.remaining();
  }

  /**
   * Maximum pseudonyms and alliterations this engine can ever issue.
   */
  capacity(): { total: number; alliterations: number } {
    return {
      total: this.fullPool.size(),
      alliterations: this.alliterationPool.size(),
    };
  }

  /**
   * Unused pseudonyms and alliterations left.
   */
  remaining(): { total: number; alliterations: number } {
    return {
      total: this.fullPool.remaining(),
      alliterations: this.alliterationPool.remaining(),
    };
  }

  /**
   * Registry contents in the order pseudonyms were issued.
   */
  entries(): RegistryEntry[] {
    return [...this.registry].map(([fingerprint, pseudonym]) => ({
      fingerprint,
      pseudonym,
    }));
  }

  alliterates(): boolean {
    return this.defaultAlliterate;
  }

  /**
   * Undrawn indices of both pools, for consistency checks.
   */
  poolSnapshot(): { full: LinearIndex[]; alliterations: LinearIndex[] } {
    return {
      full: this.fullPool.remainingIndices(),
      alliterations: this.alliterationPool.remainingIndices(),
    };
  }
}
