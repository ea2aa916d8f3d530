import { Types } from '@taskloom/core';

function formatScalar(value: Types.JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Human-readable lines for a skill result. Shell-like results show their
 * output streams; other objects print one line per key, with nested values
 * as indented JSON.
 */
export function formatResult(result: Types.JsonValue): string[] {
  if (Array.isArray(result)) {
    return [JSON.stringify(result, null, 2)];
  }
  if (!Types.isJsonObject(result)) {
    return [formatScalar(result)];
  }

  const stdout = result['stdout'];
  if (typeof stdout === 'string') {
    const lines: string[] = [];
    if (stdout.trim()) {
      lines.push('Output:', stdout.trimEnd());
    }
    const stderr = result['stderr'];
    if (typeof stderr === 'string' && stderr.trim()) {
      lines.push('Errors:', stderr.trimEnd());
    }
    return lines;
  }

  const lines: string[] = [];
  for (const [key, value] of Object.entries(result)) {
    if (value !== null && typeof value === 'object') {
      lines.push(`${key}:`, JSON.stringify(value, null, 2));
    } else {
      lines.push(`${key}: ${formatScalar(value)}`);
    }
  }
  return lines;
}

/**
 * The in-band `{ error }` of a skill result, if any.
 */
export function resultError(result: Types.JsonValue): string | null {
  if (!Types.isJsonObject(result)) return null;
  const error = result['error'];
  if (error === undefined || error === null) return null;
  return formatScalar(error);
}
