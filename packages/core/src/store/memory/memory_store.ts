import type { JsonValue } from '../../types';
import { cloneJson } from '../../types';
import type { KeyValueStore } from '../store';

/**
 * Options for MemoryStore
 */
export interface MemoryStoreOptions {
  /** Initial data */
  initial?: Map<string, JsonValue>;

  /** Clone data on load/save (default: true) */
  deepClone?: boolean;
}

/**
 * MemoryStore - In-memory implementation of KeyValueStore
 *
 * Designed for unit tests and runs that need no persistence.
 * By default, clones values on load/save to prevent accidental mutations.
 *
 * @example
 * const store = new MemoryStore();
 * await store.save('global_context', { theme: 'dark' });
 *
 * expect(await store.exists('global_context')).toBe(true);
 * expect(store.size()).toBe(1);
 *
 * store.clear();
 */
export class MemoryStore implements KeyValueStore {
  private readonly data: Map<string, JsonValue>;
  private readonly deepClone: boolean;

  constructor(options: MemoryStoreOptions = {}) {
    this.data = options.initial ?? new Map();
    this.deepClone = options.deepClone ?? true;
  }

  private clone(value: JsonValue): JsonValue {
    return this.deepClone ? cloneJson(value) : value;
  }

  async save(key: string, value: JsonValue): Promise<boolean> {
    this.data.set(key, this.clone(value));
    return true;
  }

  async load(key: string): Promise<JsonValue | null> {
    const value = this.data.get(key);
    return value !== undefined ? this.clone(value) : null;
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.data.has(key);
  }

  async listKeys(): Promise<Set<string>> {
    return new Set(this.data.keys());
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of KeyValueStore, only for tests)
  // ─────────────────────────────────────────────────────────

  /** Clears all entries from the store */
  clear(): void {
    this.data.clear();
  }

  /** Returns the number of entries */
  size(): number {
    return this.data.size;
  }

  /** Returns a copy of the internal Map (for assertions) */
  getAll(): Map<string, JsonValue> {
    return new Map(this.data);
  }
}
