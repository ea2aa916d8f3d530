import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { JsonObject, JsonValue } from '../../types';
import { cloneJson, isJsonObject } from '../../types';
import type { FileStoreOptions, KeyValueStore } from '../store';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * FileStore - every key in a single JSON file
 *
 * The whole map is read once on first access and rewritten on each
 * mutation. A missing or corrupt file starts the store empty.
 *
 * When a write fails the in-memory map keeps the change; callers get
 * `false` and must treat the mutation as not persisted.
 *
 * @example
 * const store = new FileStore({ filePath: './memory/taskloom_memory.json' });
 * await store.save('sessions', {});
 */
export class FileStore implements KeyValueStore {
  private readonly filePath: string;
  private readonly logger: Logger;
  private data: JsonObject | null = null;
  private loading: Promise<JsonObject> | null = null;

  constructor(options: FileStoreOptions) {
    this.filePath = options.filePath;
    this.logger = options.logger ?? createLogger('[FileStore] ');
  }

  private async ensureLoaded(): Promise<JsonObject> {
    if (this.data) return this.data;
    if (!this.loading) {
      this.loading = this.readAll().then((data) => {
        this.data = data;
        return data;
      });
    }
    return this.loading;
  }

  private async readAll(): Promise<JsonObject> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        this.logger.error(`Failed to load JSON: ${errorMessage(error)}`);
      }
      return {};
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (!isJsonObject(parsed)) {
        this.logger.error(`Failed to load JSON: ${this.filePath} does not hold an object`);
        return {};
      }
      return parsed;
    } catch (error) {
      this.logger.error(`Failed to load JSON: ${errorMessage(error)}`);
      return {};
    }
  }

  private async writeAll(data: JsonObject): Promise<boolean> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(data, null, 2), 'utf-8');
      return true;
    } catch (error) {
      this.logger.error(`Failed to save JSON: ${errorMessage(error)}`);
      return false;
    }
  }

  async save(key: string, value: JsonValue): Promise<boolean> {
    const data = await this.ensureLoaded();
    data[key] = cloneJson(value);
    return this.writeAll(data);
  }

  async load(key: string): Promise<JsonValue | null> {
    const data = await this.ensureLoaded();
    const value = data[key];
    return value === undefined ? null : cloneJson(value);
  }

  async delete(key: string): Promise<boolean> {
    const data = await this.ensureLoaded();
    if (!Object.prototype.hasOwnProperty.call(data, key)) {
      return false;
    }
    delete data[key];
    return this.writeAll(data);
  }

  async exists(key: string): Promise<boolean> {
    const data = await this.ensureLoaded();
    return Object.prototype.hasOwnProperty.call(data, key);
  }

  async listKeys(): Promise<Set<string>> {
    const data = await this.ensureLoaded();
    return new Set(Object.keys(data));
  }
}
