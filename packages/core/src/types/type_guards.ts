/**
 * Structural type guards for JSON-shaped values.
 *
 * Used at the boundaries where data arrives untyped: store loads, parsed
 * CLI parameters and values returned by skills.
 *
 * @module types/type_guards
 */

import type { JsonObject, JsonValue } from './common.types';

/**
 * Type guard: plain object (not null, not an array).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    return false;
  }
  return Object.values(value).every(isJsonValue);
}

/**
 * Type guard: value survives a JSON round trip unchanged in shape.
 * Non-finite numbers, functions, undefined and symbols are rejected.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return isJsonObject(value);
    default:
      return false;
  }
}

/**
 * Deep copy of a JSON value.
 */
export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}
