/**
 * PRNG Service - Seedable Pseudo-Random Number Generator
 *
 * SplitMix64 expands the seed into two 64-bit state words; Xoroshiro128+
 * generates from them. This is the random source behind every permutation
 * pool, so a fixed seed reproduces the order pseudonyms are handed out in.
 *
 * References:
 * - SplitMix64: https://prng.di.unimi.it/splitmix64.c
 * - Xoroshiro128+: https://prng.di.unimi.it/xoroshiro128plus.c
 *
 * @example
 * ```typescript
 * const prng = new PRNG(12345n);
 * const randomFloat = prng.nextFloat();  // [0, 1)
 * const order = shuffleInPlace(Uint32Array.of(1, 2, 3, 4), prng);
 *
 * const unseeded = PRNG.fromEntropy();   // seeded from crypto.randomBytes
 * ```
 */

import crypto from 'crypto';
import type { RandomSource } from '../types/pseudonym.types.js';

const UINT32_MAX = 0x100000000;
const SPLITMIX64_GAMMA = 0x9e3779b97f4a7c15n;
const SPLITMIX64_CONST_1 = 0xbf58476d1ce4e5b9n;
const SPLITMIX64_CONST_2 = 0x94d049bb133111ebn;
const XOROSHIRO_ROTL_A = 24n;
const XOROSHIRO_ROTL_B = 37n;
const XOROSHIRO_SHIFT = 16n;
const BIGINT_64 = 64n;
const BIGINT_32 = 32n;

function u64(value: bigint): bigint {
  return BigInt.asUintN(64, value);
}

/**
 * PRNG implements RandomSource with SplitMix64 seeding and Xoroshiro128+
 * generation. All state arithmetic is done in BigInt masked to 64 bits.
 */
export class PRNG implements RandomSource {
  private state0: bigint;
  private state1: bigint;

  /**
   * @param seed - Integer seed; numbers must be safe integers
   * @throws {Error} If seed is neither a bigint nor a safe integer
   */
  constructor(seed: bigint | number) {
    let seed64: bigint;
    if (typeof seed === 'bigint') {
      seed64 = u64(seed);
    } else if (typeof seed === 'number' && Number.isSafeInteger(seed)) {
      seed64 = u64(BigInt(seed));
    } else {
      throw new Error('seed must be a BigInt or a safe integer');
    }

    const [s0, s1] = this.splitMix64Init(seed64);
    this.state0 = s0;
    this.state1 = s1;
  }

  /**
   * Creates a PRNG seeded from the operating system's entropy source.
   */
  static fromEntropy(): PRNG {
    return new PRNG(crypto.randomBytes(8).readBigUInt64BE());
  }

  private splitMix64Init(seed: bigint): [bigint, bigint] {
    let x = seed;
    const next = (): bigint => {
      x = u64(x + SPLITMIX64_GAMMA);
      let z = x;
      z = u64((z ^ (z >> 30n)) * SPLITMIX64_CONST_1);
      z = u64((z ^ (z >> 27n)) * SPLITMIX64_CONST_2);
      return z ^ (z >> 31n);
    };
    const s0 = next();
    const s1 = next();
    // An all-zero state would only ever produce zeros
    return s0 === 0n && s1 === 0n ? [1n, 0n] : [s0, s1];
  }

  private next(): bigint {
    const s0 = this.state0;
    let s1 = this.state1;
    const result = u64(s0 + s1);

    s1 ^= s0;
    this.state0 = u64(this.rotl(s0, XOROSHIRO_ROTL_A) ^ s1 ^ (s1 << XOROSHIRO_SHIFT));
    this.state1 = this.rotl(s1, XOROSHIRO_ROTL_B);

    return result;
  }

  private rotl(x: bigint, k: bigint): bigint {
    return u64((x << k) | (x >> (BIGINT_64 - k)));
  }

  /**
   * Uniform 32-bit unsigned integer from the upper half of the 64-bit output.
   */
  nextUint(): number {
    return Number(this.next() >> BIGINT_32) >>> 0;
  }

  /**
   * Uniform float in [0, 1).
   */
  nextFloat(): number {
    return this.nextUint() / UINT32_MAX;
  }
}

/**
 * In-place Fisher-Yates shuffle of a typed index array against any
 * RandomSource. Returns the same array.
 */
export function shuffleInPlace(array: Uint32Array, random: RandomSource): Uint32Array {
  for (let i = array.length - 1; i > 0; i--) {
    const j = Math.floor(random.nextFloat() * (i + 1));
    const held = array[i];
    array[i] = array[j];
    array[j] = held;
  }
  return array;
}
