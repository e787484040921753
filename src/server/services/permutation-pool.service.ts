/**
 * Permutation Pool - A consumable, randomly ordered source of linear indices.
 *
 * The pool holds a shuffled sequence in a Uint32Array and a cursor. Everything
 * before the cursor has been drawn or skipped; everything after it is still
 * available, in the order it will be drawn. A second Uint32Array maps each
 * index back to its slot, so removing an index only touches that slot:
 *
 * - draw(k): hand out the next k live indices and advance the cursor
 * - remove(indices): mark indices consumed through another pool as gone;
 *   draw() skips them later, the rest keep their order
 *
 * @example
 * ```typescript
 * const pool = PermutationPool.fromRange(4, new PRNG(1n));
 * pool.draw(2);      // e.g. [3, 1]
 * pool.remove([4]);  // 4 was issued elsewhere
 * pool.remaining();  // 1
 * ```
 */

import type { LinearIndex, RandomSource } from '../types/pseudonym.types.js';
import { InsufficientCapacityError } from '../utils/errors.js';
import { shuffleInPlace } from './prng.service.js';

/** Indices start at 1, so 0 marks a removed slot. */
const REMOVED = 0;
const MAX_INDEX = 0xffffffff;

export class PermutationPool {
  private readonly sequence: Uint32Array;
  /** index -> slot + 1; 0 when the index is not in this pool */
  private readonly slots: Uint32Array;
  private cursor = 0;
  /** Removed slots still ahead of the cursor */
  private removedAhead = 0;
  private drawnCount = 0;

  private constructor(sequence: Uint32Array) {
    this.sequence = sequence;

    let max = 0;
    for (let slot = 0; slot < sequence.length; slot++) {
      if (sequence[slot] > max) max = sequence[slot];
    }
    this.slots = new Uint32Array(max + 1);
    for (let slot = 0; slot < sequence.length; slot++) {
      this.slots[sequence[slot]] = slot + 1;
    }
  }

  /**
   * Random permutation of 1..total.
   */
  static fromRange(total: number, random: RandomSource): PermutationPool {
    if (!Number.isInteger(total) || total < 0 || total > MAX_INDEX) {
      throw new RangeError(`total must be an integer between 0 and ${MAX_INDEX}`);
    }
    const sequence = new Uint32Array(total);
    for (let i = 0; i < total; i++) {
      sequence[i] = i + 1;
    }
    return new PermutationPool(shuffleInPlace(sequence, random));
  }

  /**
   * Random permutation of an explicit index set. Duplicates are dropped.
   *
   * @throws {RangeError} If an index is not an integer in 1..2^32-1
   */
  static fromIndices(
    indices: readonly LinearIndex[],
    random: RandomSource
  ): PermutationPool {
    const unique = [...new Set(indices)];
    for (const index of unique) {
      if (!Number.isInteger(index) || index < 1 || index > MAX_INDEX) {
        throw new RangeError(`index must be an integer between 1 and ${MAX_INDEX}, got ${index}`);
      }
    }
    return new PermutationPool(shuffleInPlace(Uint32Array.from(unique), random));
  }

  /**
   * Next k undrawn indices in stored order.
   *
   * @throws {RangeError} If k is not a non-negative integer
   * @throws {InsufficientCapacityError} If k exceeds remaining(); the pool is unchanged
   */
  draw(k: number): LinearIndex[] {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError('k must be a non-negative integer');
    }
    const remaining = this.remaining();
    if (k > remaining) {
      throw new InsufficientCapacityError(k, remaining);
    }

    const drawn: LinearIndex[] = [];
    while (drawn.length < k) {
      const index = this.sequence[this.cursor];
      this.cursor++;
      if (index === REMOVED) {
        this.removedAhead--;
        continue;
      }
      drawn.push(index);
    }
    this.drawnCount += k;
    return drawn;
  }

  /**
   * Removes indices from the undrawn part. Indices that are not waiting in
   * this pool (already drawn, or never part of it) are ignored.
   */
  remove(indices: Iterable<LinearIndex>): void {
    for (const index of indices) {
      const slot = this.slotOf(index);
      if (slot === undefined || slot < this.cursor || this.sequence[slot] === REMOVED) {
        continue;
      }
      this.sequence[slot] = REMOVED;
      this.removedAhead++;
    }
  }

  private slotOf(index: LinearIndex): number | undefined {
    if (!Number.isInteger(index) || index < 1 || index >= this.slots.length) {
      return undefined;
    }
    const stored = this.slots[index];
    return stored === 0 ? undefined : stored - 1;
  }

  remaining(): number {
    return this.sequence.length - this.cursor - this.removedAhead;
  }

  /**
   * Number of indices the pool started with.
   */
  size(): number {
    return this.sequence.length;
  }

  /**
   * Number of indices drawn from this pool (removals not included).
   */
  drawn(): number {
    return this.drawnCount;
  }

  /**
   * Copy of the undrawn indices in draw order.
   */
  remainingIndices(): LinearIndex[] {
    const indices: LinearIndex[] = [];
    for (let slot = this.cursor; slot < this.sequence.length; slot++) {
      if (this.sequence[slot] !== REMOVED) {
        indices.push(this.sequence[slot]);
      }
    }
    return indices;
  }
}
