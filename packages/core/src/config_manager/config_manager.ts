/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to taskloom.config.json. Missing sections and keys
 * take their defaults; invalid values are rejected.
 *
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import type { ConfigStore } from '../config_store';
import type { StoreConfig } from '../store';
import { cloneJson } from '../types';
import { validateConfig } from './config_schema';
import { ConfigValidationError } from './errors';
import type { IConfigManager, TaskloomConfig } from './config_manager.types';

export const DEFAULT_MEMORY_PATHS: Readonly<Record<StoreConfig['backend'], string>> = {
  yaml: './memory',
  json: './memory/taskloom_memory.json',
  memory: '',
};

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * const configManager = new ConfigManager(new FsConfigStore('/path/to/project'));
 * const config = await configManager.loadConfig();
 *
 * // Test usage
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ engine: { maxConcurrentTasks: 2 } });
 * const configManager = new ConfigManager(configStore);
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load configuration with defaults applied. A missing file yields the
   * all-defaults configuration.
   *
   * @throws ConfigValidationError when a value violates the schema
   */
  async loadConfig(): Promise<TaskloomConfig> {
    const raw = await this.configStore.loadConfig();
    const candidate: unknown = raw ? cloneJson(raw) : {};

    if (!validateConfig(candidate)) {
      const details = (validateConfig.errors ?? []).map((error) => {
        const where = error.instancePath ? error.instancePath.slice(1).replace(/\//g, '.') : 'config';
        return `${where} ${error.message ?? 'is invalid'}`;
      });
      throw new ConfigValidationError(details);
    }

    const { memory, ...rest } = candidate;
    return {
      ...rest,
      memory: {
        backend: memory.backend,
        path: memory.path ?? DEFAULT_MEMORY_PATHS[memory.backend],
      },
    };
  }

  /**
   * Store settings for createKeyValueStore().
   */
  async getStoreConfig(): Promise<StoreConfig> {
    const config = await this.loadConfig();
    return { backend: config.memory.backend, path: config.memory.path };
  }
}
