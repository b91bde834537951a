import type { JsonValue } from '../types/launch.js';

/**
 * Check that a value is a plain (non-array, non-null) object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Return the value when it is a non-empty string, otherwise undefined.
 */
export function nonEmpty(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

/**
 * Check that a value survives a JSON round trip unchanged.
 *
 * Integers outside the safe range are rejected: `JSON.parse` has already
 * rounded them, so they cannot be re-serialized as the client sent them.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) && (!Number.isInteger(value) || Number.isSafeInteger(value));
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return isRecord(value) && Object.values(value).every(isJsonValue);
}
