/**
 * Domain errors raised by the pseudonym allocation engine and its callers.
 *
 * Every error carries a machine-readable `code` so the HTTP layer can map it
 * onto an API error without string matching on messages.
 */

export enum PseudonymErrorCode {
  EMPTY_CATEGORY = 'EMPTY_CATEGORY',
  DUPLICATE_WORD = 'DUPLICATE_WORD',
  NAME_SPACE_TOO_LARGE = 'NAME_SPACE_TOO_LARGE',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  INSUFFICIENT_CAPACITY = 'INSUFFICIENT_CAPACITY',
  CAPACITY_EXHAUSTED = 'CAPACITY_EXHAUSTED',
  INCONSISTENT_LENGTH = 'INCONSISTENT_LENGTH',
  NAME_PARTS_FILE = 'NAME_PARTS_FILE',
  CONFIGURATION = 'CONFIGURATION',
}

/**
 * Base class for all domain errors.
 */
export class PseudonymError extends Error {
  readonly code: PseudonymErrorCode;

  constructor(code: PseudonymErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A name-part category has no words, or no categories were given at all.
 */
export class EmptyCategoryError extends PseudonymError {
  readonly category: string | undefined;

  constructor(category?: string) {
    super(
      PseudonymErrorCode.EMPTY_CATEGORY,
      category === undefined
        ? 'At least one name-part category is required.'
        : `Name-part category "${category}" has no words.`
    );
    this.category = category;
  }
}

export class DuplicateWordError extends PseudonymError {
  readonly category: string;
  readonly word: string;

  constructor(category: string, word: string) {
    super(
      PseudonymErrorCode.DUPLICATE_WORD,
      `Name-part category "${category}" contains "${word}" more than once.`
    );
    this.category = category;
    this.word = word;
  }
}

export class NameSpaceTooLargeError extends PseudonymError {
  readonly total: number;
  readonly limit: number;

  constructor(total: number, limit: number) {
    super(
      PseudonymErrorCode.NAME_SPACE_TOO_LARGE,
      `Name space has ${total} combinations, more than the supported ${limit}.`
    );
    this.total = total;
    this.limit = limit;
  }
}

/**
 * A linear index or subscript fell outside the name space. Seeing this
 * outside of tests means the engine itself is broken.
 */
export class IndexOutOfRangeError extends PseudonymError {
  constructor(message: string) {
    super(PseudonymErrorCode.INDEX_OUT_OF_RANGE, message);
  }
}

/**
 * A permutation pool was asked for more indices than it has left.
 */
export class InsufficientCapacityError extends PseudonymError {
  readonly requested: number;
  readonly remaining: number;

  constructor(requested: number, remaining: number) {
    super(
      PseudonymErrorCode.INSUFFICIENT_CAPACITY,
      `Requested ${requested} indices but only ${remaining} remain in the pool.`
    );
    this.requested = requested;
    this.remaining = remaining;
  }
}

export interface CapacityExhaustedDetails {
  /** Number of new pseudonyms the call needed */
  requested: number;
  /** Unused pseudonyms left in the full name space */
  remainingTotal: number;
  /** Unused alliterations left */
  remainingAlliterations: number;
  /** Whether the failing call asked for alliterations */
  alliterate: boolean;
}

/**
 * Not enough unused pseudonyms are left to serve a request.
 *
 * `alliterationOnly` is true when the call asked for alliterations and the
 * full name space could still have served it without that restriction.
 */
export class CapacityExhaustedError extends PseudonymError {
  readonly requested: number;
  readonly remainingTotal: number;
  readonly remainingAlliterations: number;
  readonly alliterate: boolean;
  readonly alliterationOnly: boolean;

  constructor(details: CapacityExhaustedDetails) {
    const alliterationOnly =
      details.alliterate && details.requested <= details.remainingTotal;

    let message =
      'Not enough unused pseudonyms left. ' +
      `Requested: ${details.requested}, available: ${details.remainingTotal} ` +
      `(${details.remainingAlliterations} alliterations). ` +
      'Try using custom name parts.';
    if (alliterationOnly) {
      message +=
        ' Note: more alliterations were requested than are available, ' +
        'but there are enough pseudonyms left that are not alliterations.';
    }

    super(PseudonymErrorCode.CAPACITY_EXHAUSTED, message);
    this.requested = details.requested;
    this.remainingTotal = details.remainingTotal;
    this.remainingAlliterations = details.remainingAlliterations;
    this.alliterate = details.alliterate;
    this.alliterationOnly = alliterationOnly;
  }
}

/**
 * Key columns passed together do not have the same number of rows.
 */
export class InconsistentLengthError extends PseudonymError {
  readonly lengths: number[];

  constructor(lengths: number[]) {
    super(
      PseudonymErrorCode.INCONSISTENT_LENGTH,
      lengths.length === 0
        ? 'At least one key column is required.'
        : `All key columns must have the same length, got ${lengths.join(', ')}.`
    );
    this.lengths = lengths;
  }
}

export class NamePartsFileError extends PseudonymError {
  readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(
      PseudonymErrorCode.NAME_PARTS_FILE,
      `Failed to load name parts from ${filePath}: ${reason}`
    );
    this.filePath = filePath;
  }
}

export class ConfigurationError extends PseudonymError {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(PseudonymErrorCode.CONFIGURATION, `${variable}: ${message}`);
    this.variable = variable;
  }
}
