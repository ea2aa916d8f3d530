import * as fs from 'fs/promises';
import * as path from 'path';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { JsonValue } from '../../types';
import { isJsonValue } from '../../types';
import type { FsStoreOptions, KeyValueStore, Serializer } from '../store';
import { YAML_SERIALIZER } from '../serializers';

/**
 * Maps a key to a safe file stem: path separators become underscores.
 */
export function sanitizeKey(key: string): string {
  return key.replace(/[/\\]/g, '_');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * FsStore - one file per key
 *
 * Persists each value as its own file under `basePath`, YAML by default.
 *
 * @example
 * const store = new FsStore({ basePath: './memory' });
 *
 * await store.save('global_context', { theme: 'dark' });
 * const value = await store.load('global_context');
 */
export class FsStore implements KeyValueStore {
  private readonly basePath: string;
  private readonly serializer: Serializer;
  private readonly createIfMissing: boolean;
  private readonly logger: Logger;

  constructor(options: FsStoreOptions) {
    this.basePath = options.basePath;
    this.serializer = options.serializer ?? YAML_SERIALIZER;
    this.createIfMissing = options.createIfMissing ?? true;
    this.logger = options.logger ?? createLogger('[FsStore] ');
  }

  private getFilePath(key: string): string {
    return path.join(this.basePath, `${sanitizeKey(key)}${this.serializer.extension}`);
  }

  async save(key: string, value: JsonValue): Promise<boolean> {
    try {
      if (this.createIfMissing) {
        await fs.mkdir(this.basePath, { recursive: true });
      }
      await fs.writeFile(this.getFilePath(key), this.serializer.stringify(value), 'utf-8');
      return true;
    } catch (error) {
      this.logger.error(`Failed to save ${key}: ${errorMessage(error)}`);
      return false;
    }
  }

  async load(key: string): Promise<JsonValue | null> {
    let content: string;
    try {
      content = await fs.readFile(this.getFilePath(key), 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.error(`Failed to load ${key}: ${errorMessage(error)}`);
      }
      return null;
    }

    try {
      const parsed = this.serializer.parse(content);
      if (parsed === undefined) {
        return null;
      }
      if (!isJsonValue(parsed)) {
        this.logger.error(`Failed to load ${key}: content is not JSON-compatible`);
        return null;
      }
      return parsed;
    } catch (error) {
      this.logger.error(`Failed to load ${key}: ${errorMessage(error)}`);
      return null;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.getFilePath(key));
      return true;
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.error(`Failed to delete ${key}: ${errorMessage(error)}`);
      }
      return false;
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.getFilePath(key));
      return true;
    } catch {
      return false;
    }
  }

  async listKeys(): Promise<Set<string>> {
    const extension = this.serializer.extension;
    try {
      const files = await fs.readdir(this.basePath);
      return new Set(
        files
          .filter((f) => f.endsWith(extension))
          .map((f) => f.slice(0, -extension.length))
      );
    } catch (error) {
      if (!isMissingFile(error)) {
        this.logger.error(`Failed to list keys: ${errorMessage(error)}`);
      }
      return new Set();
    }
  }
}
