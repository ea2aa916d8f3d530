export { MemoryStore } from './memory_store';
export type { MemoryStoreOptions } from './memory_store';
