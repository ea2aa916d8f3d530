import type { JsonValue } from '../types';
import { isJsonObject } from '../types';
import type { SkillParams } from '../skill_registry';

/**
 * Typed readers over bound skill parameters. A value of the wrong type
 * reads as absent.
 */

export function readString(params: SkillParams, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(params: SkillParams, key: string): number | undefined {
  const value = params[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(params: SkillParams, key: string): boolean | undefined {
  const value = params[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function readStringArray(params: SkillParams, key: string): string[] | undefined {
  const value = params[key];
  if (!Array.isArray(value)) return undefined;
  return value.filter((item: JsonValue): item is string => typeof item === 'string');
}

/**
 * String-valued entries of an object parameter, e.g. extra environment
 * variables. Non-string values are dropped.
 */
export function readStringRecord(params: SkillParams, key: string): Record<string, string> | undefined {
  const value = params[key];
  if (!isJsonObject(value)) return undefined;
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === 'string') {
      result[name] = entry;
    }
  }
  return result;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
