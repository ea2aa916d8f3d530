/**
 * JSON-shaped value carried through task parameters, skill results and
 * persisted context entries.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

/**
 * ISO-8601 timestamp string (e.g. "2024-05-01T10:00:00.000Z").
 */
export type IsoTimestamp = string;
