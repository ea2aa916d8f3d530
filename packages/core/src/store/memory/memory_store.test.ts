import { MemoryStore } from './memory_store';
import type { JsonValue } from '../../types';

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  describe('Core Store Operations', () => {
    it('should return the saved value when the key exists', async () => {
      await store.save('k', { a: 1 });

      expect(await store.load('k')).toEqual({ a: 1 });
      expect(await store.exists('k')).toBe(true);
    });

    it('should return null when the key does not exist', async () => {
      expect(await store.load('missing')).toBeNull();
    });

    it('should report whether delete removed anything', async () => {
      await store.save('k', 1);

      expect(await store.delete('k')).toBe(true);
      expect(await store.delete('k')).toBe(false);
    });

    it('should list every saved key', async () => {
      await store.save('a', 1);
      await store.save('b', 2);

      expect(await store.listKeys()).toEqual(new Set(['a', 'b']));
    });
  });

  describe('Cloning', () => {
    it('should isolate stored values from caller mutation by default', async () => {
      const value = { items: ['x'] };
      await store.save('k', value);
      value.items.push('y');

      const loaded = await store.load('k');

      expect(loaded).toEqual({ items: ['x'] });
    });

    it('should share references when deepClone is disabled', async () => {
      const shared = new MemoryStore({ deepClone: false });
      const value = { items: ['x'] };
      await shared.save('k', value);
      value.items.push('y');

      expect(await shared.load('k')).toEqual({ items: ['x', 'y'] });
    });
  });

  describe('Test Helpers', () => {
    it('should expose size, getAll and clear', async () => {
      const initial = new Map<string, JsonValue>([['seed', true]]);
      const seeded = new MemoryStore({ initial });
      await seeded.save('other', 'v');

      expect(seeded.size()).toBe(2);
      expect(seeded.getAll().get('seed')).toBe(true);

      seeded.clear();

      expect(seeded.size()).toBe(0);
    });
  });
});
