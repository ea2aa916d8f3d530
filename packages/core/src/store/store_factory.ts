import * as path from 'path';
import type { Logger } from '../logger';
import type { KeyValueStore, StoreConfig } from './store';
import { FileStore, FsStore } from './fs';
import { MemoryStore } from './memory';
import { YAML_SERIALIZER } from './serializers';

/**
 * Builds the store selected by the `memory` section of the config.
 *
 * - yaml: one YAML file per key under `path`
 * - json: every key in the single JSON file at `path`
 * - memory: nothing leaves the process
 */
export function createKeyValueStore(
  config: StoreConfig,
  options: { cwd?: string; logger?: Logger } = {}
): KeyValueStore {
  const cwd = options.cwd ?? process.cwd();
  const location = path.resolve(cwd, config.path);

  switch (config.backend) {
    case 'yaml':
      return new FsStore({
        basePath: location,
        serializer: YAML_SERIALIZER,
        ...(options.logger ? { logger: options.logger } : {}),
      });
    case 'json':
      return new FileStore({
        filePath: location,
        ...(options.logger ? { logger: options.logger } : {}),
      });
    case 'memory':
      return new MemoryStore();
  }
}
