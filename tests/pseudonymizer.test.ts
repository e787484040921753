/**
 * Pseudonymizer Tests
 *
 * End-to-end behavior of the facade: name-part handling, row keys,
 * alliteration defaults, summaries and the printable registry view.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Pseudonymizer } from '../src/server/services/pseudonymizer.service';
import type { RandomSource } from '../src/server/types/pseudonym.types';
import {
  CapacityExhaustedError,
  EmptyCategoryError,
  InconsistentLengthError,
} from '../src/server/utils/errors';

const inOrder: RandomSource = { nextFloat: () => 0.9999999 };

// 1 Big Bear, 2 Big Cat, 3 Calm Bear, 4 Calm Cat
const parts = { adjectives: ['Big', 'Calm'], animals: ['Bear', 'Cat'] };

describe('Pseudonymizer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('create()', () => {
    it('should accept a category mapping', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });

      expect(pseudonymizer.summary().total).toBe(4);
    });

    it('should accept an ordered list of parts', () => {
      const pseudonymizer = Pseudonymizer.create({
        parts: [
          { name: 'animals', words: ['Bear', 'Cat'] },
          { name: 'adjectives', words: ['Big'] },
        ],
        random: inOrder,
      });

      expect(pseudonymizer.pseudonymizeValues(['a'])).toEqual(['Bear Big']);
    });

    it('should clean words before use', () => {
      const pseudonymizer = Pseudonymizer.create({
        parts: { adjectives: ['  Very   Big ', 'Very Big'], animals: ['Bear'] },
        random: inOrder,
      });

      expect(pseudonymizer.summary().total).toBe(1);
      expect(pseudonymizer.pseudonymizeValues(['a'])).toEqual(['Very Big Bear']);
    });

    it('should reject categories left empty by cleaning', () => {
      expect(() =>
        Pseudonymizer.create({ parts: { adjectives: ['  '], animals: ['Bear'] } })
      ).toThrow(EmptyCategoryError);
    });

    it('should use the default name parts', () => {
      const summary = Pseudonymizer.create({ seed: 1 }).summary();

      expect(summary.total).toBe(5110);
      expect(summary.totalAlliterations).toBe(226);
    });

    it('should reproduce pseudonyms for the same seed', () => {
      const keys = ['alice', 'bob', 'carol'];
      const first = Pseudonymizer.create({ seed: 7 }).pseudonymizeValues(keys);
      const second = Pseudonymizer.create({ seed: 7 }).pseudonymizeValues(keys);

      expect(first).toEqual(second);
      expect(first.every((name) => name.split(' ').length === 2)).toBe(true);
    });

    it('should use the separator', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder, separator: '_' });

      expect(pseudonymizer.pseudonymizeValues(['a'])).toEqual(['Big_Bear']);
    });
  });

  describe('pseudonymize()', () => {
    it('should give repeated keys the same pseudonym', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });

      expect(pseudonymizer.pseudonymizeValues(['a', 'b', 'a', 'c'])).toEqual([
        'Big Bear',
        'Big Cat',
        'Big Bear',
        'Calm Bear',
      ]);
      expect(pseudonymizer.size()).toBe(3);
    });

    it('should treat each row of several columns as one key', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });

      expect(
        pseudonymizer.pseudonymize([
          ['x', 'x', 'x'],
          [1, 2, 1],
        ])
      ).toEqual(['Big Bear', 'Big Cat', 'Big Bear']);
    });

    it('should tell numbers and strings apart', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });

      expect(pseudonymizer.pseudonymizeValues([1, '1'])).toEqual(['Big Bear', 'Big Cat']);
    });

    it('should reject columns of different lengths without drawing', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });

      expect(() => pseudonymizer.pseudonymize([['a'], ['b', 'c']])).toThrow(
        'All key columns must have the same length, got 1, 2.'
      );
      expect(pseudonymizer.size()).toBe(0);
    });

    it('should reject an empty column list', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });

      expect(() => pseudonymizer.pseudonymize([])).toThrow(InconsistentLengthError);
    });

    it('should follow the alliteration default and per-call override', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder, alliterate: true });

      expect(pseudonymizer.pseudonymizeValues(['a'])).toEqual(['Big Bear']);
      expect(pseudonymizer.pseudonymizeValues(['b'])).toEqual(['Calm Cat']);
      expect(() => pseudonymizer.pseudonymizeValues(['c'])).toThrow(CapacityExhaustedError);
      expect(pseudonymizer.pseudonymizeValues(['c'], { alliterate: false })).toEqual([
        'Big Cat',
      ]);
    });
  });

  describe('summary()', () => {
    it('should report usage and percentages', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder, alliterate: true });
      pseudonymizer.pseudonymizeValues(['a']);

      expect(pseudonymizer.summary()).toEqual({
        alliterate: true,
        used: 1,
        total: 4,
        usedAlliterations: 1,
        totalAlliterations: 2,
        percentUsed: 25,
        percentAlliterationsUsed: 50,
      });
    });

    it('should report zero percent when there are no alliterations', () => {
      const pseudonymizer = Pseudonymizer.create({
        parts: { adjectives: ['Big'], animals: ['Cat'] },
        random: inOrder,
      });

      expect(pseudonymizer.summary().percentAlliterationsUsed).toBe(0);
    });
  });

  describe('preview()', () => {
    it('should shorten fingerprints', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });
      pseudonymizer.pseudonymizeValues(['a', 'b']);

      expect(pseudonymizer.preview(5)).toEqual([
        { key: '1da622b7...', pseudonym: 'Big Bear' },
        { key: 'd1c2360b...', pseudonym: 'Big Cat' },
      ]);
    });
  });

  describe('format()', () => {
    it('should describe an empty registry', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });

      expect(pseudonymizer.format()).toBe(
        [
          '# A pseudonym registry',
          '# 0 / 4 pseudonyms used (0%)',
          '# 0 / 2 alliterations used (0%)',
          '',
          'The registry is empty.',
        ].join('\n')
      );
    });

    it('should list entries and how many were left out', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });
      pseudonymizer.pseudonymizeValues(['a', 'b']);

      expect(pseudonymizer.format(1)).toBe(
        [
          '# A pseudonym registry',
          '# 2 / 4 pseudonyms used (50%)',
          '# 1 / 2 alliterations used (50%)',
          '',
          '  key         pseudonym',
          '1 1da622b7... Big Bear',
          '# ...with 1 more entries',
        ].join('\n')
      );
    });

    it('should describe a full registry', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder, alliterate: false });
      pseudonymizer.pseudonymizeValues(['a', 'b', 'c', 'd']);

      expect(pseudonymizer.format().split('\n')).toEqual([
        '# A pseudonym registry',
        '# 4 / 4 pseudonyms used (100%)',
        '# 2 / 2 alliterations used (100%)',
        '',
        'The registry is full.',
      ]);
    });

    it('should mark alliterating registries', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder, alliterate: true });

      expect(pseudonymizer.format().split('\n')[0]).toBe('# An alliterating pseudonym registry');
    });

    it('should reject limits that are not positive integers', () => {
      const pseudonymizer = Pseudonymizer.create({ parts, random: inOrder });

      expect(() => pseudonymizer.format(0)).toThrow(RangeError);
    });
  });
});
