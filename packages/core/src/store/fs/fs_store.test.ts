import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsStore, sanitizeKey } from './fs_store';
import { JSON_SERIALIZER } from '../serializers';
import type { Logger } from '../../logger';

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe('FsStore', () => {
  let store: FsStore;
  let tempDir: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-store-test-'));
    logger = createMockLogger();
    store = new FsStore({ basePath: tempDir, logger });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // ─────────────────────────────────────────────────────────
  // Core Store Operations
  // ─────────────────────────────────────────────────────────

  describe('Core Store Operations', () => {
    it('should return the saved value when the key exists', async () => {
      const value = { id: 'test-1', name: 'Test Record', tags: ['a', 'b'] };

      expect(await store.save('test-1', value)).toBe(true);

      expect(await store.load('test-1')).toEqual(value);
    });

    it('should return null when the key was never saved', async () => {
      expect(await store.load('non-existent')).toBeNull();
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('should write YAML files by default', async () => {
      await store.save('global_context', { theme: 'dark' });

      const content = await fs.readFile(path.join(tempDir, 'global_context.yaml'), 'utf-8');
      expect(content).toBe('theme: dark\n');
    });

    it('should keep ISO timestamps as strings after a YAML round trip', async () => {
      await store.save('stamp', { at: '2024-01-02T03:04:05.000Z' });

      expect(await store.load('stamp')).toEqual({ at: '2024-01-02T03:04:05.000Z' });
    });

    it('should overwrite an existing value', async () => {
      await store.save('k', { name: 'Original' });
      await store.save('k', { name: 'Updated' });

      expect(await store.load('k')).toEqual({ name: 'Updated' });
      expect(await store.listKeys()).toEqual(new Set(['k']));
    });

    it('should delete an existing key', async () => {
      await store.save('k', 1);

      expect(await store.delete('k')).toBe(true);
      expect(await store.exists('k')).toBe(false);
      expect(await store.load('k')).toBeNull();
    });

    it('should return false when deleting a missing key', async () => {
      expect(await store.delete('non-existent')).toBe(false);
    });

    it('should list keys by file stem', async () => {
      await store.save('id-1', 'a');
      await store.save('id-2', 'b');
      await fs.writeFile(path.join(tempDir, 'notes.txt'), 'ignored');

      expect(await store.listKeys()).toEqual(new Set(['id-1', 'id-2']));
    });

    it('should return an empty set when the directory does not exist', async () => {
      const missing = new FsStore({ basePath: path.join(tempDir, 'missing'), logger });

      expect(await missing.listKeys()).toEqual(new Set());
    });
  });

  // ─────────────────────────────────────────────────────────
  // FsStore-Specific Behavior
  // ─────────────────────────────────────────────────────────

  describe('FsStore-Specific Behavior', () => {
    it('should replace path separators in keys', async () => {
      expect(sanitizeKey('a/b\\c')).toBe('a_b_c');

      await store.save('../escape', 'x');

      expect(await fs.readdir(tempDir)).toEqual(['.._escape.yaml']);
    });

    it('should create the base directory on first save', async () => {
      const nested = new FsStore({ basePath: path.join(tempDir, 'a', 'b'), logger });

      expect(await nested.save('k', true)).toBe(true);
      expect(await nested.exists('k')).toBe(true);
    });

    it('should use the JSON serializer when given', async () => {
      const jsonStore = new FsStore({ basePath: tempDir, serializer: JSON_SERIALIZER, logger });

      await jsonStore.save('k', { a: 1 });

      const content = await fs.readFile(path.join(tempDir, 'k.json'), 'utf-8');
      expect(JSON.parse(content)).toEqual({ a: 1 });
    });
  });

  // ─────────────────────────────────────────────────────────
  // Failure Handling
  // ─────────────────────────────────────────────────────────

  describe('Failure Handling', () => {
    it('should return false and log when the write fails', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'not a directory');
      const broken = new FsStore({ basePath: path.join(blocker, 'sub'), logger });

      expect(await broken.save('k', 1)).toBe(false);
      expect(logger.error).toHaveBeenCalledWith(expect.stringContaining('Failed to save k'));
    });

    it('should return null and log when the file cannot be parsed', async () => {
      await fs.writeFile(path.join(tempDir, 'bad.yaml'), 'key: [unclosed');

      expect(await store.load('bad')).toBeNull();
      expect(logger.error).toHaveBeenCalledWith(expect.stringContaining('Failed to load bad'));
    });
  });
});
