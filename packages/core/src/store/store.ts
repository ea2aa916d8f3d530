import type { JsonValue } from '../types';
import type { Logger } from '../logger';

/**
 * Persistence backend for named blobs.
 *
 * No method rejects. Mutations resolve `true` only after the value is on
 * durable storage; `false` means the caller should treat the operation as
 * not having happened. I/O failures are logged by the implementation.
 */
export interface KeyValueStore {
  /**
   * Persists a value, overwriting any previous value for the key.
   */
  save(key: string, value: JsonValue): Promise<boolean>;

  /**
   * Loads a value.
   * @returns The value or null if the key was never saved or was deleted
   */
  load(key: string): Promise<JsonValue | null>;

  /**
   * Removes a value.
   * @returns false if the key did not exist or deletion failed
   */
  delete(key: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;

  /**
   * All stored keys (order not significant).
   */
  listKeys(): Promise<Set<string>>;
}

/**
 * Serializer for FsStore - allows custom serialization
 */
export interface Serializer {
  /** File extension including the dot (e.g. ".yaml") */
  extension: string;
  stringify: (value: JsonValue) => string;
  parse: (text: string) => unknown;
}

/**
 * Options for FsStore (one file per key)
 */
export interface FsStoreOptions {
  /** Base directory for files */
  basePath: string;

  /** Serializer (default: YAML) */
  serializer?: Serializer;

  /** Create directory if it doesn't exist (default: true) */
  createIfMissing?: boolean;

  logger?: Logger;
}

/**
 * Options for FileStore (all keys in one JSON file)
 */
export interface FileStoreOptions {
  /** Path of the aggregate JSON file */
  filePath: string;

  logger?: Logger;
}

/**
 * Backend selection, as found in the `memory` section of the config.
 */
export type StoreBackend = 'yaml' | 'json' | 'memory';

export interface StoreConfig {
  backend: StoreBackend;
  /** Directory (yaml) or file (json); ignored for memory */
  path: string;
}
