/**
 * Name Space - Ordered name-part categories and the size of their product.
 *
 * Every pseudonym takes exactly one word from each category, so the number of
 * distinct pseudonyms is the product of the category sizes. Category order is
 * fixed here and is the order the subscript codec and pseudonym strings use.
 */

import type { NamePart, Subscript } from '../types/pseudonym.types.js';
import {
  DuplicateWordError,
  EmptyCategoryError,
  IndexOutOfRangeError,
  NameSpaceTooLargeError,
} from '../utils/errors.js';

/**
 * Largest index space the engine builds pools for. The full pool keeps two
 * Uint32Arrays of this length (about 512 MB at the limit).
 */
export const MAX_NAME_SPACE_SIZE = 2 ** 26;

/**
 * Frozen view of one category.
 */
export interface Category {
  readonly name: string;
  readonly words: readonly string[];
}

export class NameSpace {
  private readonly parts: readonly Category[];
  private readonly categorySizes: readonly number[];
  private readonly size: number;

  /**
   * @throws {EmptyCategoryError} If no categories are given or one has no words
   * @throws {DuplicateWordError} If a category lists the same word twice
   * @throws {NameSpaceTooLargeError} If the product exceeds MAX_NAME_SPACE_SIZE
   */
  constructor(parts: readonly NamePart[]) {
    if (parts.length === 0) {
      throw new EmptyCategoryError();
    }

    for (const part of parts) {
      if (part.words.length === 0) {
        throw new EmptyCategoryError(part.name);
      }
      const seen = new Set<string>();
      for (const word of part.words) {
        if (seen.has(word)) {
          throw new DuplicateWordError(part.name, word);
        }
        seen.add(word);
      }
    }

    this.parts = Object.freeze(
      parts.map((part) =>
        Object.freeze({ name: part.name, words: Object.freeze([...part.words]) })
      )
    );
    this.categorySizes = Object.freeze(parts.map((part) => part.words.length));
    this.size = this.categorySizes.reduce((product, n) => product * n, 1);

    if (this.size > MAX_NAME_SPACE_SIZE) {
      throw new NameSpaceTooLargeError(this.size, MAX_NAME_SPACE_SIZE);
    }
  }

  sizes(): number[] {
    return [...this.categorySizes];
  }

  total(): number {
    return this.size;
  }

  categories(): readonly Category[] {
    return this.parts;
  }

  /**
   * Word at a 1-based position of a category.
   */
  wordAt(category: number, position: number): string {
    const part = this.parts[category];
    if (part === undefined) {
      throw new IndexOutOfRangeError(
        `Category ${category} does not exist (have ${this.parts.length}).`
      );
    }
    const word = part.words[position - 1];
    if (word === undefined) {
      throw new IndexOutOfRangeError(
        `Position ${position} is outside category "${part.name}" (1..${part.words.length}).`
      );
    }
    return word;
  }

  /**
   * Words a subscript points at, in category order.
   */
  wordsFor(subscript: Subscript): string[] {
    if (subscript.length !== this.parts.length) {
      throw new IndexOutOfRangeError(
        `Subscript has ${subscript.length} components, expected ${this.parts.length}.`
      );
    }
    return subscript.map((position, category) => this.wordAt(category, position));
  }
}
