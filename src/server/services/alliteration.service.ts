/**
 * Alliteration Finder - Enumerates pseudonyms whose words share a first letter.
 *
 * For each letter A-Z, collect per category the positions of words starting
 * with that letter (case-insensitive). If every category has at least one,
 * every combination of those positions is an alliteration. Words starting
 * with anything outside A-Z never alliterate.
 */

import type { LinearIndex, Subscript } from '../types/pseudonym.types.js';
import type { NameSpace } from './name-space.service.js';
import type { SubscriptCodec } from './subscript-codec.service.js';

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

function firstLetter(word: string): string {
  return word.charAt(0).toUpperCase();
}

/**
 * Cartesian product of per-category position lists, as subscripts.
 */
function cartesianProduct(positions: readonly number[][]): Subscript[] {
  let combinations: Subscript[] = [[]];
  for (const choices of positions) {
    const next: Subscript[] = [];
    for (const prefix of combinations) {
      for (const position of choices) {
        next.push([...prefix, position]);
      }
    }
    combinations = next;
  }
  return combinations;
}

/**
 * Linear indices of all alliterating pseudonyms, grouped by letter in
 * alphabetical order. May be empty.
 */
export function findAlliterations(
  nameSpace: NameSpace,
  codec: SubscriptCodec
): LinearIndex[] {
  const initials = nameSpace
    .categories()
    .map((category) => category.words.map(firstLetter));

  const found = new Set<LinearIndex>();

  for (const letter of ALPHABET) {
    const positions = initials.map((letters) =>
      letters.flatMap((initial, i) => (initial === letter ? [i + 1] : []))
    );
    if (positions.some((matches) => matches.length === 0)) {
      continue;
    }

    for (const index of codec.encodeMany(cartesianProduct(positions))) {
      found.add(index);
    }
  }

  return [...found];
}

/**
 * Whether a list of words alliterates under the same rule.
 */
export function isAlliteration(words: readonly string[]): boolean {
  if (words.length === 0) return false;
  const letter = firstLetter(words[0]);
  return (
    letter.length === 1 &&
    ALPHABET.includes(letter) &&
    words.every((word) => firstLetter(word) === letter)
  );
}
