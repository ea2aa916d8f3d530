/**
 * Taskloom configuration types (taskloom.config.json)
 */

import type { LogLevel } from '../logger';
import type { StoreBackend } from '../store';

export type TaskloomConfig = {
  memory: {
    backend: StoreBackend;
    /** Directory for yaml, file for json; resolved against the project root */
    path: string;
  };
  context: {
    maxHistoryLength: number;
    contextWindow: number;
  };
  engine: {
    maxConcurrentTasks: number;
  };
  skills: {
    hotReload: boolean;
    /** CommonJS modules exporting extra skill definitions */
    modules: string[];
  };
  logLevel?: LogLevel;
};

/**
 * Shape after schema defaults are applied; `memory.path` depends on the
 * backend and is filled by ConfigManager.
 */
export type ValidatedConfig = Omit<TaskloomConfig, 'memory'> & {
  memory: {
    backend: StoreBackend;
    path?: string;
  };
};

export interface IConfigManager {
  loadConfig(): Promise<TaskloomConfig>;
}
