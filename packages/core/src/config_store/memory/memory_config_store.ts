/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { JsonObject } from '../../types';
import { cloneJson } from '../../types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ engine: { maxConcurrentTasks: 2 } });
 * const config = await new ConfigManager(configStore).loadConfig();
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: JsonObject | null = null;

  async loadConfig(): Promise<JsonObject | null> {
    return this.config ? cloneJson(this.config) : null;
  }

  async saveConfig(config: JsonObject): Promise<void> {
    this.config = cloneJson(config);
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set configuration directly (for test setup). Accepts null to clear.
   */
  setConfig(config: JsonObject | null): void {
    this.config = config ? cloneJson(config) : null;
  }

  getConfig(): JsonObject | null {
    return this.config;
  }
}
