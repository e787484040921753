/**
 * Subscript Codec - Mixed-radix conversion between linear indices and subscripts.
 *
 * Radix order: the RIGHTMOST category varies fastest. With sizes [2, 3]:
 *
 *   index:     1      2      3      4      5      6
 *   subscript: [1,1]  [1,2]  [1,3]  [2,1]  [2,2]  [2,3]
 *
 * encode: index = 1 + Σ (pos_i - 1) * weight_i, weight_i = Π sizes[j] for j > i
 * decode: peel components off from the last category to the first
 *
 * Both directions must use this order; alliteration indices and pool contents
 * are only meaningful under it.
 */

import type { LinearIndex, Subscript } from '../types/pseudonym.types.js';
import { IndexOutOfRangeError } from '../utils/errors.js';

export class SubscriptCodec {
  private readonly sizes: readonly number[];
  private readonly weights: readonly number[];
  private readonly total: number;

  constructor(sizes: readonly number[]) {
    this.sizes = Object.freeze([...sizes]);

    const weights = new Array<number>(sizes.length);
    let weight = 1;
    for (let i = sizes.length - 1; i >= 0; i--) {
      weights[i] = weight;
      weight *= sizes[i];
    }
    this.weights = Object.freeze(weights);
    this.total = weight;
  }

  /**
   * Linear index of a subscript.
   *
   * @throws {IndexOutOfRangeError} On wrong length or out-of-range components
   */
  encode(subscript: Subscript): LinearIndex {
    if (subscript.length !== this.sizes.length) {
      throw new IndexOutOfRangeError(
        `Subscript has ${subscript.length} components, expected ${this.sizes.length}.`
      );
    }

    let index = 1;
    for (let i = 0; i < subscript.length; i++) {
      const position = subscript[i];
      if (!Number.isInteger(position) || position < 1 || position > this.sizes[i]) {
        throw new IndexOutOfRangeError(
          `Subscript component ${i} is ${position}, expected 1..${this.sizes[i]}.`
        );
      }
      index += (position - 1) * this.weights[i];
    }
    return index;
  }

  /**
   * Subscript of a linear index.
   *
   * @throws {IndexOutOfRangeError} If index is not an integer in [1, total]
   */
  decode(index: LinearIndex): Subscript {
    if (!Number.isInteger(index) || index < 1 || index > this.total) {
      throw new IndexOutOfRangeError(
        `Index ${index} is outside the name space (1..${this.total}).`
      );
    }

    const subscript = new Array<number>(this.sizes.length);
    let rest = index - 1;
    for (let i = this.sizes.length - 1; i >= 0; i--) {
      subscript[i] = (rest % this.sizes[i]) + 1;
      rest = Math.floor(rest / this.sizes[i]);
    }
    return subscript;
  }

  encodeMany(subscripts: readonly Subscript[]): LinearIndex[] {
    return subscripts.map((subscript) => this.encode(subscript));
  }

  decodeMany(indices: readonly LinearIndex[]): Subscript[] {
    return indices.map((index) => this.decode(index));
  }

  size(): number {
    return this.total;
  }
}
