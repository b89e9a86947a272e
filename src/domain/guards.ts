/**
 * Shape guards and field readers for loosely-typed JSON.
 *
 * Request bodies and persisted documents both arrive as `unknown`; these
 * helpers narrow them without casts. Readers throw a ServiceError carrying
 * a VALIDATION.SCHEMA error when a required field is absent or mistyped.
 */

import { ServiceError, validationError } from './errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isList(value: unknown): value is unknown[] {
  return Array.isArray(value);
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Id of a stored row: a non-empty string, or a number kept in its string form. */
export function readId(value: unknown): string | undefined {
  if (isString(value)) return value.length > 0 ? value : undefined;
  if (isNumber(value)) return String(value);
  return undefined;
}

export function stringOr(value: unknown, fallback: string): string {
  return isString(value) ? value : fallback;
}

export function numberOr(value: unknown, fallback: number): number {
  return isNumber(value) ? value : fallback;
}

/** A string or numeric reference kept as a string; anything else reads as null. */
export function nullableRef(value: unknown): string | null {
  return readId(value) ?? null;
}

/** Coerce a request body to a record, rejecting arrays and primitives. */
export function requireBody(body: unknown): Record<string, unknown> {
  if (!isRecord(body)) {
    throw new ServiceError(validationError('Request body must be a JSON object'));
  }
  return body;
}

export function requiredString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (!isString(value) || value.length === 0) {
    throw new ServiceError(validationError(`${field} is required and must be a non-empty string`, { field }));
  }
  return value;
}

export function optionalString(body: Record<string, unknown>, field: string, fallback: string): string {
  const value = body[field];
  if (value === undefined || value === null) return fallback;
  if (!isString(value)) {
    throw new ServiceError(validationError(`${field} must be a string`, { field }));
  }
  return value;
}

export function requiredInteger(body: Record<string, unknown>, field: string): number {
  const value = body[field];
  if (!isNumber(value) || !Number.isInteger(value)) {
    throw new ServiceError(validationError(`${field} is required and must be an integer`, { field }));
  }
  return value;
}

export function optionalInteger(body: Record<string, unknown>, field: string, fallback: number): number {
  const value = body[field];
  if (value === undefined || value === null) return fallback;
  if (!isNumber(value) || !Number.isInteger(value)) {
    throw new ServiceError(validationError(`${field} must be an integer`, { field }));
  }
  return value;
}

/** Own-property lookup; ignores keys inherited from Object.prototype. */
export function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}
