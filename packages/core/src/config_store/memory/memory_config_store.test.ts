import { MemoryConfigStore } from './memory_config_store';

describe('MemoryConfigStore', () => {
  it('should return null until a config is set', async () => {
    expect(await new MemoryConfigStore().loadConfig()).toBeNull();
  });

  it('should return configs set via setConfig and saveConfig', async () => {
    const store = new MemoryConfigStore();

    store.setConfig({ logLevel: 'debug' });
    expect(await store.loadConfig()).toEqual({ logLevel: 'debug' });

    await store.saveConfig({ logLevel: 'warn' });
    expect(store.getConfig()).toEqual({ logLevel: 'warn' });
  });

  it('should hand out copies', async () => {
    const store = new MemoryConfigStore();
    store.setConfig({ skills: { modules: ['./a.js'] } });

    const loaded = await store.loadConfig();
    if (loaded) {
      loaded['skills'] = null;
    }

    expect(await store.loadConfig()).toEqual({ skills: { modules: ['./a.js'] } });
  });

  it('should clear the config when set to null', async () => {
    const store = new MemoryConfigStore();
    store.setConfig({ logLevel: 'debug' });
    store.setConfig(null);

    expect(await store.loadConfig()).toBeNull();
  });
});
