/**
 * Pseudonymizer - Main entry point for turning key values into pseudonyms.
 *
 * Wraps an AllocationEngine with everything around it:
 * - name-part resolution (defaults, files, in-memory mappings)
 * - seeding of the random source
 * - column validation and row fingerprinting
 * - usage summaries and a printable view of the registry
 *
 * @example
 * ```typescript
 * const pseudonymizer = Pseudonymizer.create({ seed: 42 });
 *
 * pseudonymizer.pseudonymize([['alice', 'bob', 'alice']]);
 * // e.g. ['Gentle Otter', 'Swift Heron', 'Gentle Otter']
 *
 * // Several columns form one key per row
 * pseudonymizer.pseudonymize([['alice', 'alice'], [1, 2]]);
 * ```
 */

import type {
  KeyValue,
  NamePart,
  PseudonymSummary,
  RandomSource,
} from '../types/pseudonym.types.js';
import { InconsistentLengthError } from '../utils/errors.js';
import {
  AllocationEngine,
  DEFAULT_SEPARATOR,
  fingerprintPreview,
} from './allocation.service.js';
import { FingerprintService } from './fingerprint.service.js';
import { NameSpace } from './name-space.service.js';
import { cleanNameParts, resolveNameParts, toNameParts } from './name-parts.service.js';
import { PRNG } from './prng.service.js';

export const DEFAULT_FORMAT_LIMIT = 10;

export interface PseudonymizerOptions {
  /** Category mapping or ordered parts; cleaned before use */
  parts?: Record<string, readonly string[]> | readonly NamePart[];
  /** JSON or YAML name-parts file, used when `parts` is not given */
  namePartsFile?: string;
  /** Seed for reproducible permutations; random when omitted */
  seed?: bigint | number;
  /** Issue alliterations by default */
  alliterate?: boolean;
  separator?: string;
  /** Appended to serialized rows before hashing */
  pepper?: string;
  /** Overrides the seeded PRNG */
  random?: RandomSource;
}

export interface PseudonymizeOptions {
  alliterate?: boolean;
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : (part / whole) * 100;
}

function isNamePartList(
  parts: NonNullable<PseudonymizerOptions['parts']>
): parts is readonly NamePart[] {
  return Array.isArray(parts);
}

function resolveParts(options: PseudonymizerOptions): NamePart[] {
  const { parts } = options;
  if (parts === undefined) {
    return resolveNameParts(options.namePartsFile);
  }
  return cleanNameParts(isNamePartList(parts) ? parts : toNameParts(parts));
}

export class Pseudonymizer {
  private readonly engine: AllocationEngine;
  private readonly fingerprints: FingerprintService;

  constructor(engine: AllocationEngine, fingerprints: FingerprintService) {
    this.engine = engine;
    this.fingerprints = fingerprints;
  }

  /**
   * Builds a pseudonymizer from options.
   *
   * @throws {EmptyCategoryError} If a category is empty after cleaning
   * @throws {NamePartsFileError} If a name-parts file cannot be loaded
   */
  static create(options: PseudonymizerOptions = {}): Pseudonymizer {
    const nameSpace = new NameSpace(resolveParts(options));
    const random =
      options.random ??
      (options.seed === undefined ? PRNG.fromEntropy() : new PRNG(options.seed));

    const engine = new AllocationEngine({
      nameSpace,
      random,
      alliterate: options.alliterate ?? false,
      separator: options.separator ?? DEFAULT_SEPARATOR,
    });

    return new Pseudonymizer(engine, new FingerprintService(options.pepper));
  }

  /**
   * Pseudonyms for each row of a set of key columns, in row order.
   *
   * @param columns - One or more equal-length columns; row i of all columns
   *   together is one key
   * @throws {InconsistentLengthError} If no columns are given or their lengths
   *   differ; nothing is hashed or drawn
   * @throws {CapacityExhaustedError} If too few unused pseudonyms remain
   */
  pseudonymize(
    columns: readonly (readonly KeyValue[])[],
    options: PseudonymizeOptions = {}
  ): string[] {
    const lengths = columns.map((column) => column.length);
    if (lengths.length === 0 || new Set(lengths).size > 1) {
      throw new InconsistentLengthError(lengths);
    }

    const keys = this.fingerprints.fingerprintColumns(columns);
    return this.engine.pseudonymize(keys, options.alliterate);
  }

  /**
   * Single-column shorthand for pseudonymize().
   */
  pseudonymizeValues(
    values: readonly KeyValue[],
    options: PseudonymizeOptions = {}
  ): string[] {
    return this.pseudonymize([values], options);
  }

  size(): number {
    return this.engine.size();
  }

  alliterationCount(): number {
    return this.engine.alliterationCount();
  }

  summary(): PseudonymSummary {
    const used = this.engine.size();
    const usedAlliterations = this.engine.alliterationCount();
    const capacity = this.engine.capacity();

    return {
      alliterate: this.engine.alliterates(),
      used,
      total: capacity.total,
      usedAlliterations,
      totalAlliterations: capacity.alliterations,
      percentUsed: percent(used, capacity.total),
      percentAlliterationsUsed: percent(usedAlliterations, capacity.alliterations),
    };
  }

  /**
   * First `limit` registry entries as fingerprint preview and pseudonym.
   */
  preview(limit: number = DEFAULT_FORMAT_LIMIT): Array<{ key: string; pseudonym: string }> {
    return this.engine
      .entries()
      .slice(0, limit)
      .map(({ fingerprint, pseudonym }) => ({
        key: fingerprintPreview(fingerprint),
        pseudonym,
      }));
  }

  /**
   * Printable view: a usage header, then the first `limit` entries.
   *
   * @example
   * ```
   * # A pseudonym registry
   * # 2 / 5110 pseudonyms used (0%)
   * # 0 / 226 alliterations used (0%)
   *
   *   key         pseudonym
   * 1 5f1c09ab... Gentle Otter
   * 2 0b7e44d2... Swift Heron
   * ```
   *
   * @throws {RangeError} If limit is not a positive integer
   */
  format(limit: number = DEFAULT_FORMAT_LIMIT): string {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new RangeError('limit must be a positive integer');
    }

    const s = this.summary();
    const lines = [
      s.alliterate ? '# An alliterating pseudonym registry' : '# A pseudonym registry',
      `# ${s.used} / ${s.total} pseudonyms used (${s.percentUsed.toFixed(0)}%)`,
      `# ${s.usedAlliterations} / ${s.totalAlliterations} alliterations used ` +
        `(${s.percentAlliterationsUsed.toFixed(0)}%)`,
      '',
    ];

    if (s.used === 0) {
      lines.push('The registry is empty.');
      return lines.join('\n');
    }
    if (s.used >= s.total) {
      lines.push('The registry is full.');
      return lines.join('\n');
    }

    const entries = this.preview(limit);
    const width = String(entries.length).length;
    lines.push(`${' '.repeat(width)} key         pseudonym`);
    entries.forEach(({ key, pseudonym }, i) => {
      lines.push(`${String(i + 1).padStart(width)} ${key} ${pseudonym}`);
    });
    if (entries.length < s.used) {
      lines.push(`# ...with ${s.used - entries.length} more entries`);
    }
    return lines.join('\n');
  }
}
