export { FsStore, sanitizeKey } from './fs_store';
export { FileStore } from './file_store';
