export type {
  KeyValueStore,
  Serializer,
  FsStoreOptions,
  FileStoreOptions,
  StoreBackend,
  StoreConfig,
} from './store';
export { JSON_SERIALIZER, YAML_SERIALIZER } from './serializers';
export { FsStore, FileStore, sanitizeKey } from './fs';
export { MemoryStore } from './memory';
export type { MemoryStoreOptions } from './memory';
export { createKeyValueStore } from './store_factory';
