export { CONFIG_FILE_NAME } from './config_store';
export type { ConfigStore } from './config_store';
export { FsConfigStore } from './fs/fs_config_store';
export { MemoryConfigStore } from './memory/memory_config_store';
