export { ConfigManager, DEFAULT_MEMORY_PATHS } from './config_manager';
export { ConfigValidationError } from './errors';
export { CONFIG_SCHEMA } from './config_schema';
export type { IConfigManager, TaskloomConfig } from './config_manager.types';
