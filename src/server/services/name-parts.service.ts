/**
 * Name Parts - Loading and cleaning of name-part categories.
 *
 * Name parts come from one of three places:
 * - the bundled default list (data/name-parts.json, adjectives x animals)
 * - a JSON or YAML file named by the caller
 * - an in-memory mapping of category name to words
 *
 * Files may use the versioned shape `{ version, parts: { category: words } }`
 * or a bare `{ category: words }` mapping. Category order is the key order
 * of the mapping.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import type { NamePart, NamePartsFile } from '../types/pseudonym.types.js';
import { NamePartsFileError } from '../utils/errors.js';

export const DEFAULT_NAME_PARTS_PATH = 'data/name-parts.json';
export const DEFAULT_CATEGORIES = ['adjectives', 'animals'] as const;

/**
 * Trims a word and collapses internal whitespace runs to one space.
 */
export function squish(word: string): string {
  return word.trim().replace(/\s+/g, ' ');
}

/**
 * Squishes every word, drops empty ones and removes duplicates, keeping the
 * first occurrence. Categories themselves are kept even if they end up empty,
 * so the name space can reject them.
 */
export function cleanNameParts(parts: readonly NamePart[]): NamePart[] {
  return parts.map((part) => {
    const words = part.words.map(squish).filter((word) => word.length > 0);
    return { name: part.name, words: [...new Set(words)] };
  });
}

/**
 * Converts a category mapping to an ordered list of name parts.
 */
export function toNameParts(mapping: Record<string, readonly string[]>): NamePart[] {
  return Object.entries(mapping).map(([name, words]) => ({ name, words: [...words] }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isWordList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((word) => typeof word === 'string');
}

/**
 * Validates parsed file content and returns it in the versioned shape.
 *
 * @returns The file, or a reason string if it is malformed
 */
export function parseNamePartsDocument(document: unknown): NamePartsFile | string {
  if (!isRecord(document)) {
    return 'expected a mapping of category names to word lists';
  }

  const versioned = 'parts' in document;
  const rawParts = versioned ? document.parts : document;
  if (!isRecord(rawParts)) {
    return '"parts" must be a mapping of category names to word lists';
  }

  const parts: Record<string, string[]> = {};
  for (const [name, words] of Object.entries(rawParts)) {
    if (!isWordList(words)) {
      return `category "${name}" must be a list of strings`;
    }
    parts[name] = words;
  }
  if (Object.keys(parts).length === 0) {
    return 'no categories defined';
  }

  const version =
    versioned && typeof document.version === 'string' ? document.version : 'unversioned';
  return { version, parts };
}

/**
 * Reads a name-parts file. `.yaml` and `.yml` are parsed as YAML, anything
 * else as JSON.
 *
 * @throws {NamePartsFileError} If the file cannot be read or is malformed
 */
export function loadNamePartsFile(filePath: string): NamePartsFile {
  const resolved = path.resolve(process.cwd(), filePath);
  const extension = path.extname(resolved).toLowerCase();

  let document: unknown;
  try {
    const data = fs.readFileSync(resolved, 'utf-8');
    document = extension === '.yaml' || extension === '.yml' ? parseYaml(data) : JSON.parse(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(
      JSON.stringify({
        operation: 'loadNamePartsFile',
        error: reason,
        path: filePath,
        timestamp: new Date().toISOString(),
      })
    );
    throw new NamePartsFileError(filePath, reason);
  }

  const parsed = parseNamePartsDocument(document);
  if (typeof parsed === 'string') {
    throw new NamePartsFileError(filePath, parsed);
  }
  return parsed;
}

/**
 * Bundled adjectives and animals, cleaned.
 *
 * @throws {NamePartsFileError} If the bundled file is missing a default category
 */
export function loadDefaultNameParts(): NamePart[] {
  const file = loadNamePartsFile(path.join(process.cwd(), DEFAULT_NAME_PARTS_PATH));

  const parts: NamePart[] = [];
  for (const name of DEFAULT_CATEGORIES) {
    const words = file.parts[name];
    if (words === undefined) {
      throw new NamePartsFileError(DEFAULT_NAME_PARTS_PATH, `missing category "${name}"`);
    }
    parts.push({ name, words });
  }
  return cleanNameParts(parts);
}

/**
 * Cleaned name parts from a file, or the defaults when no path is given.
 */
export function resolveNameParts(filePath?: string): NamePart[] {
  if (filePath === undefined) {
    return loadDefaultNameParts();
  }
  return cleanNameParts(toNameParts(loadNamePartsFile(filePath).parts));
}
