/**
 * Input validation for the pseudonym API endpoints.
 *
 * Provides validation for:
 * - Key columns (equal-length arrays of JSON scalars)
 * - A single key array (shorthand for one column)
 * - The optional alliterate flag
 * - The optional limit query parameter of the registry view
 *
 * Validators never throw; they return a ValidationResult with structured
 * errors the endpoints pass on to the client.
 */

import type { KeyValue } from '../types/pseudonym.types';

/**
 * Default number of registry entries returned by GET /api/registry.
 */
export const DEFAULT_REGISTRY_LIMIT = 10;

/**
 * Upper bound on the limit query parameter.
 */
export const MAX_REGISTRY_LIMIT = 1000;

/**
 * Enumeration of API validation error codes.
 */
export enum APIErrorCode {
  /** Required parameter is missing from the request */
  MISSING_PARAMETER = 'MISSING_PARAMETER',
  /** Parameter has wrong type (e.g., string instead of array) */
  INVALID_TYPE = 'INVALID_TYPE',
  /** Key values are not JSON scalars, or no rows were given */
  INVALID_KEYS = 'INVALID_KEYS',
  /** More rows than a single request may carry */
  ROW_COUNT_EXCEEDED = 'ROW_COUNT_EXCEEDED',
  /** Key columns differ in length */
  INCONSISTENT_LENGTH = 'INCONSISTENT_LENGTH',
}

export interface ValidationError {
  code: APIErrorCode;
  message: string;
  field: string;
  details?: {
    expected?: string;
    received?: unknown;
    [key: string]: unknown;
  };
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Validated body of POST /api/pseudonymize.
 */
export interface PseudonymizeRequest {
  columns: KeyValue[][];
  alliterate?: boolean;
}

function isKeyValue(value: unknown): value is KeyValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

function failure(error: ValidationError): ValidationResult {
  return { isValid: false, errors: [error] };
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates one key column: an array of strings, finite numbers, booleans
 * or nulls.
 *
 * @example
 * ```typescript
 * validateKeyArray(['alice', 42, null], 'keys').isValid; // true
 * validateKeyArray([{ id: 1 }], 'keys').isValid;         // false
 * ```
 */
export function validateKeyArray(
  keys: unknown,
  fieldName: string = 'keys'
): ValidationResult {
  if (keys === undefined) {
    return failure({
      code: APIErrorCode.MISSING_PARAMETER,
      message: `${fieldName} is required`,
      field: fieldName,
      details: { expected: 'array of strings, numbers, booleans or nulls' },
    });
  }

  if (!Array.isArray(keys)) {
    return failure({
      code: APIErrorCode.INVALID_TYPE,
      message: `${fieldName} must be an array`,
      field: fieldName,
      details: { expected: 'array', received: describeType(keys) },
    });
  }

  const invalidKeys: Array<{ index: number; received: string }> = [];
  keys.forEach((key: unknown, index: number) => {
    if (!isKeyValue(key)) {
      invalidKeys.push({ index, received: describeType(key) });
    }
  });

  if (invalidKeys.length > 0) {
    return failure({
      code: APIErrorCode.INVALID_KEYS,
      message: `${fieldName} contains invalid values`,
      field: fieldName,
      details: {
        expected: 'strings, finite numbers, booleans or nulls',
        invalidKeys,
        totalInvalid: invalidKeys.length,
      },
    });
  }

  return { isValid: true, errors: [] };
}

/**
 * Validates a list of key columns. Columns must be non-empty, valid key
 * arrays of equal length, with at least one and at most `maxRows` rows.
 */
export function validateKeyColumns(
  columns: unknown,
  maxRows: number,
  fieldName: string = 'columns'
): ValidationResult {
  if (columns === undefined) {
    return failure({
      code: APIErrorCode.MISSING_PARAMETER,
      message: `${fieldName} is required`,
      field: fieldName,
      details: { expected: 'array of key columns' },
    });
  }

  if (!Array.isArray(columns)) {
    return failure({
      code: APIErrorCode.INVALID_TYPE,
      message: `${fieldName} must be an array`,
      field: fieldName,
      details: { expected: 'array', received: describeType(columns) },
    });
  }

  if (columns.length === 0) {
    return failure({
      code: APIErrorCode.INVALID_KEYS,
      message: `${fieldName} cannot be empty`,
      field: fieldName,
      details: { expected: 'at least one key column', received: 'empty array' },
    });
  }

  for (let i = 0; i < columns.length; i++) {
    const result = validateKeyArray(columns[i], `${fieldName}[${i}]`);
    if (!result.isValid) {
      return result;
    }
  }

  const lengths = columns.map((column: unknown[]) => column.length);
  if (new Set(lengths).size > 1) {
    return failure({
      code: APIErrorCode.INCONSISTENT_LENGTH,
      message: `all ${fieldName} must have the same length`,
      field: fieldName,
      details: { received: lengths },
    });
  }

  const rows = lengths[0];
  if (rows === 0) {
    return failure({
      code: APIErrorCode.INVALID_KEYS,
      message: `${fieldName} must contain at least one row`,
      field: fieldName,
      details: { expected: `1-${maxRows} rows`, received: 0 },
    });
  }

  if (rows > maxRows) {
    return failure({
      code: APIErrorCode.ROW_COUNT_EXCEEDED,
      message: `${fieldName} cannot contain more than ${maxRows} rows`,
      field: fieldName,
      details: {
        expected: `maximum ${maxRows} rows`,
        received: `${rows} rows`,
        maxAllowed: maxRows,
      },
    });
  }

  return { isValid: true, errors: [] };
}

/**
 * Validates the optional alliterate flag.
 */
export function validateAlliterate(
  alliterate: unknown,
  fieldName: string = 'alliterate'
): ValidationResult {
  if (alliterate === undefined || typeof alliterate === 'boolean') {
    return { isValid: true, errors: [] };
  }
  return failure({
    code: APIErrorCode.INVALID_TYPE,
    message: `${fieldName} must be a boolean`,
    field: fieldName,
    details: { expected: 'boolean', received: describeType(alliterate) },
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKeyColumns(value: unknown): value is KeyValue[][] {
  return (
    Array.isArray(value) &&
    value.every((column: unknown) => Array.isArray(column) && column.every(isKeyValue))
  );
}

/**
 * Validates and parses the body of POST /api/pseudonymize.
 *
 * Accepts either `{ columns: [[...], [...]] }` or `{ keys: [...] }`, plus an
 * optional `alliterate` boolean. Exactly one of columns/keys must be given.
 */
export function parsePseudonymizeRequest(
  body: unknown,
  maxRows: number
): { result: ValidationResult; request?: PseudonymizeRequest } {
  if (!isRecord(body)) {
    return {
      result: failure({
        code: APIErrorCode.INVALID_TYPE,
        message: 'request body must be a JSON object',
        field: 'body',
        details: { expected: 'object', received: describeType(body) },
      }),
    };
  }

  const { columns, keys, alliterate } = body;

  if (columns !== undefined && keys !== undefined) {
    return {
      result: failure({
        code: APIErrorCode.INVALID_TYPE,
        message: 'provide either columns or keys, not both',
        field: 'body',
      }),
    };
  }

  let candidate: unknown = columns;
  if (keys !== undefined) {
    const keyResult = validateKeyArray(keys, 'keys');
    if (!keyResult.isValid) {
      return { result: keyResult };
    }
    candidate = [keys];
  }

  const columnsResult = validateKeyColumns(
    candidate,
    maxRows,
    keys !== undefined ? 'keys' : 'columns'
  );
  if (!columnsResult.isValid) {
    return { result: columnsResult };
  }

  const alliterateResult = validateAlliterate(alliterate);
  if (!alliterateResult.isValid) {
    return { result: alliterateResult };
  }

  if (!isKeyColumns(candidate)) {
    return {
      result: failure({
        code: APIErrorCode.INVALID_KEYS,
        message: 'columns contain invalid values',
        field: 'columns',
      }),
    };
  }

  const request: PseudonymizeRequest = { columns: candidate };
  if (typeof alliterate === 'boolean') {
    request.alliterate = alliterate;
  }

  return { result: { isValid: true, errors: [] }, request };
}

/**
 * Validates the limit query parameter of GET /api/registry.
 */
export function parseRegistryLimit(
  limit: unknown,
  fieldName: string = 'limit'
): { result: ValidationResult; limit: number } {
  if (limit === undefined || limit === '') {
    return { result: { isValid: true, errors: [] }, limit: DEFAULT_REGISTRY_LIMIT };
  }

  const raw = typeof limit === 'string' ? limit.trim() : limit;
  const value = typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : NaN;

  if (!Number.isInteger(value) || value < 1 || value > MAX_REGISTRY_LIMIT) {
    return {
      result: failure({
        code: APIErrorCode.INVALID_TYPE,
        message: `${fieldName} must be an integer between 1 and ${MAX_REGISTRY_LIMIT}`,
        field: fieldName,
        details: { expected: `1-${MAX_REGISTRY_LIMIT}`, received: limit },
      }),
      limit: DEFAULT_REGISTRY_LIMIT,
    };
  }

  return { result: { isValid: true, errors: [] }, limit: value };
}
