/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads and writes taskloom.config.json in the project root. Also provides
 * a static helper for locating that root.
 */

import { promises as fs, existsSync } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import { CONFIG_FILE_NAME } from '../config_store';
import type { JsonObject } from '../../types';
import { isJsonObject } from '../../types';
import { createLogger } from '../../logger';

const logger = createLogger('[FsConfigStore] ');

/**
 * Filesystem-based ConfigStore implementation.
 *
 * Fail-safe on read: a missing file, invalid JSON or a non-object document
 * all load as null.
 *
 * @example
 * ```typescript
 * const root = FsConfigStore.findProjectRoot() ?? process.cwd();
 * const store = new FsConfigStore(root);
 * const raw = await store.loadConfig();
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, CONFIG_FILE_NAME);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async loadConfig(): Promise<JsonObject | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch {
      // No config file: all defaults
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      if (isJsonObject(parsed)) {
        return parsed;
      }
      logger.warn(`Ignoring ${this.configPath}: expected a JSON object`);
      return null;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Ignoring ${this.configPath}: ${message}`);
      return null;
    }
  }

  async saveConfig(config: JsonObject): Promise<void> {
    await fs.mkdir(path.dirname(this.configPath), { recursive: true });
    await fs.writeFile(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the project root by searching upwards for taskloom.config.json.
   *
   * @param startPath - Starting path (default: process.cwd())
   * @returns Absolute path to project root, or null if not found
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);

    // Stop at the filesystem root
    while (currentPath !== path.parse(currentPath).root) {
      if (existsSync(path.join(currentPath, CONFIG_FILE_NAME))) {
        return currentPath;
      }
      currentPath = path.dirname(currentPath);
    }

    if (existsSync(path.join(currentPath, CONFIG_FILE_NAME))) {
      return currentPath;
    }
    return null;
  }
}
