/**
 * ConfigStore Interface
 *
 * Abstraction for taskloom.config.json persistence, so ConfigManager can
 * read from the project directory or from memory in tests.
 */

import type { JsonObject } from '../types';

export const CONFIG_FILE_NAME = 'taskloom.config.json';

/**
 * Interface for project configuration persistence.
 *
 * Implementations:
 * - FsConfigStore: `<projectRoot>/taskloom.config.json`
 * - MemoryConfigStore: In-memory for tests
 *
 * The raw object is returned unvalidated; ConfigManager applies the schema.
 */
export interface ConfigStore {
  /**
   * @returns The parsed configuration object, or null if missing or unreadable
   */
  loadConfig(): Promise<JsonObject | null>;

  saveConfig(config: JsonObject): Promise<void>;
}
