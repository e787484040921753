/**
 * Environment configuration for the pseudonym server.
 *
 * Variables (see .env.example):
 * - PORT                  HTTP port (default 3000)
 * - NAME_PARTS_FILE       JSON/YAML name-parts file (default: bundled list)
 * - PSEUDONYM_SEED        integer seed for reproducible allocation
 * - PSEUDONYM_ALLITERATE  "true" to issue alliterations by default
 * - PSEUDONYM_SEPARATOR   text between pseudonym words (default " ")
 * - FINGERPRINT_PEPPER    secret appended before hashing keys
 * - MAX_ROWS_PER_REQUEST  row limit for POST /api/pseudonymize (default 1000)
 */

import { ConfigurationError } from './errors.js';
import { MIN_PEPPER_LENGTH } from '../services/fingerprint.service.js';

export const DEFAULT_PORT = 3000;
export const DEFAULT_MAX_ROWS_PER_REQUEST = 1000;

const INTEGER_REGEX = /^-?\d+$/;

export interface ServerConfig {
  port: number;
  namePartsFile?: string;
  seed?: bigint;
  alliterate: boolean;
  separator: string;
  pepper?: string;
  maxRowsPerRequest: number;
}

type Env = Record<string, string | undefined>;

function readPositiveInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!INTEGER_REGEX.test(raw) || !Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigurationError(name, `must be a positive integer, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  throw new ConfigurationError(name, `must be "true" or "false", got "${raw}"`);
}

/**
 * Reads and validates server configuration.
 *
 * @param env - Environment to read (default: process.env)
 * @throws {ConfigurationError} On the first invalid variable
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const config: ServerConfig = {
    port: readPositiveInteger(env, 'PORT', DEFAULT_PORT),
    alliterate: readBoolean(env, 'PSEUDONYM_ALLITERATE', false),
    separator: env.PSEUDONYM_SEPARATOR ?? ' ',
    maxRowsPerRequest: readPositiveInteger(
      env,
      'MAX_ROWS_PER_REQUEST',
      DEFAULT_MAX_ROWS_PER_REQUEST
    ),
  };

  const namePartsFile = env.NAME_PARTS_FILE?.trim();
  if (namePartsFile) {
    config.namePartsFile = namePartsFile;
  }

  const seed = env.PSEUDONYM_SEED?.trim();
  if (seed) {
    if (!INTEGER_REGEX.test(seed)) {
      throw new ConfigurationError('PSEUDONYM_SEED', `must be an integer, got "${seed}"`);
    }
    config.seed = BigInt(seed);
  }

  const pepper = env.FINGERPRINT_PEPPER;
  if (pepper) {
    if (pepper.length < MIN_PEPPER_LENGTH) {
      throw new ConfigurationError(
        'FINGERPRINT_PEPPER',
        `must be at least ${MIN_PEPPER_LENGTH} characters long`
      );
    }
    config.pepper = pepper;
  }

  return config;
}
