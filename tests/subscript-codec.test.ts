/**
 * SubscriptCodec Tests
 *
 * The rightmost category varies fastest; indices and positions are 1-based.
 */

import { describe, it, expect } from 'vitest';
import { SubscriptCodec } from '../src/server/services/subscript-codec.service';
import { IndexOutOfRangeError } from '../src/server/utils/errors';

describe('SubscriptCodec', () => {
  const codec = new SubscriptCodec([2, 3]);

  describe('encode()', () => {
    it('should map subscripts to linear indices', () => {
      expect(codec.encode([1, 1])).toBe(1);
      expect(codec.encode([1, 2])).toBe(2);
      expect(codec.encode([1, 3])).toBe(3);
      expect(codec.encode([2, 1])).toBe(4);
      expect(codec.encode([2, 3])).toBe(6);
    });

    it('should reject positions out of range', () => {
      expect(() => codec.encode([0, 1])).toThrow(IndexOutOfRangeError);
      expect(() => codec.encode([3, 1])).toThrow(IndexOutOfRangeError);
      expect(() => codec.encode([1, 4])).toThrow(IndexOutOfRangeError);
    });

    it('should reject subscripts of the wrong length', () => {
      expect(() => codec.encode([1])).toThrow(IndexOutOfRangeError);
      expect(() => codec.encode([1, 1, 1])).toThrow(IndexOutOfRangeError);
    });
  });

  describe('decode()', () => {
    it('should map linear indices to subscripts', () => {
      expect(codec.decode(1)).toEqual([1, 1]);
      expect(codec.decode(4)).toEqual([2, 1]);
      expect(codec.decode(5)).toEqual([2, 2]);
      expect(codec.decode(6)).toEqual([2, 3]);
    });

    it('should reject indices outside 1..size', () => {
      expect(() => codec.decode(0)).toThrow(IndexOutOfRangeError);
      expect(() => codec.decode(7)).toThrow(IndexOutOfRangeError);
      expect(() => codec.decode(1.5)).toThrow(IndexOutOfRangeError);
    });
  });

  it('should invert encode for every index of a three-category space', () => {
    const three = new SubscriptCodec([3, 4, 5]);
    expect(three.size()).toBe(60);

    for (let index = 1; index <= 60; index++) {
      expect(three.encode(three.decode(index))).toBe(index);
    }
  });

  it('should invert decode for every subscript of a three-category space', () => {
    const three = new SubscriptCodec([3, 4, 5]);
    const seen = new Set<number>();

    for (let a = 1; a <= 3; a++) {
      for (let b = 1; b <= 4; b++) {
        for (let c = 1; c <= 5; c++) {
          const index = three.encode([a, b, c]);
          expect(three.decode(index)).toEqual([a, b, c]);
          seen.add(index);
        }
      }
    }

    expect(seen.size).toBe(60);
  });

  it('should treat a single category as identity', () => {
    const single = new SubscriptCodec([5]);

    expect(single.decode(3)).toEqual([3]);
    expect(single.encode([5])).toBe(5);
  });

  it('should convert batches in order', () => {
    expect(codec.decodeMany([6, 1])).toEqual([
      [2, 3],
      [1, 1],
    ]);
    expect(codec.encodeMany([[2, 2], [1, 2]])).toEqual([5, 2]);
  });
});
