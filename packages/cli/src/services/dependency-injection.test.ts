import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Engine } from '@taskloom/core';
import { DependencyInjectionService, isStoreBackend } from './dependency-injection';

describe('DependencyInjectionService', () => {
  let tempDir: string;

  beforeEach(async () => {
    DependencyInjectionService.reset();
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'taskloom-di-test-'));
  });

  afterEach(async () => {
    DependencyInjectionService.reset();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(config: object): Promise<void> {
    await fs.promises.writeFile(path.join(tempDir, 'taskloom.config.json'), JSON.stringify(config));
  }

  describe('Singleton Pattern', () => {
    it('should return same instance across multiple calls', () => {
      expect(DependencyInjectionService.getInstance()).toBe(DependencyInjectionService.getInstance());
    });

    it('should reset singleton instance correctly', () => {
      const first = DependencyInjectionService.getInstance();
      DependencyInjectionService.reset();
      expect(DependencyInjectionService.getInstance()).not.toBe(first);
    });
  });

  describe('Configuration', () => {
    it('should load defaults when no config file exists', async () => {
      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: tempDir });

      const config = await service.getConfig();

      expect(service.getProjectRoot()).toBe(tempDir);
      expect(config.memory).toEqual({ backend: 'yaml', path: './memory' });
      expect(config.engine.maxConcurrentTasks).toBe(5);
    });

    it('should find the project root from a nested directory', async () => {
      await writeConfig({ engine: { maxConcurrentTasks: 2 } });
      const nested = path.join(tempDir, 'a', 'b');
      await fs.promises.mkdir(nested, { recursive: true });

      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: nested });

      expect(service.getProjectRoot()).toBe(tempDir);
      expect((await service.getConfig()).engine.maxConcurrentTasks).toBe(2);
    });

    it('should let the memory flag override the configured backend and path', async () => {
      await writeConfig({ memory: { backend: 'yaml', path: './custom' } });
      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: tempDir, memoryBackend: 'json' });

      const config = await service.getConfig();

      expect(config.memory).toEqual({ backend: 'json', path: './memory/taskloom_memory.json' });
    });

    it('should keep the configured path when the flag names the same backend', async () => {
      await writeConfig({ memory: { backend: 'yaml', path: './custom' } });
      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: tempDir, memoryBackend: 'yaml' });

      expect((await service.getConfig()).memory).toEqual({ backend: 'yaml', path: './custom' });
    });
  });

  describe('Runtime Wiring', () => {
    it('should open a fresh cli session on the context manager', async () => {
      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: tempDir, memoryBackend: 'memory' });

      const contextManager = await service.getContextManager();

      expect(contextManager.getCurrentSession()?.id).toMatch(/-session-cli-/);
      expect(await service.getContextManager()).toBe(contextManager);
    });

    it('should register the built-in skills', async () => {
      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: tempDir, memoryBackend: 'memory' });

      const registry = await service.getSkillRegistry();

      expect(registry.listSkills().map((skill) => skill.name).sort()).toEqual(['echo', 'github_agent', 'local_shell']);
    });

    it('should run a task end to end through the engine', async () => {
      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: tempDir, memoryBackend: 'memory' });

      const engine = await service.getTaskEngine();
      const result = await engine.executeTask(
        Engine.createTask({ skill: 'echo', parameters: { message: 'hi' } })
      );

      expect(result).toEqual({ message: 'hi' });
    });
  });

  describe('Task Event Log', () => {
    let consoleLog: jest.SpyInstance;

    beforeEach(() => {
      consoleLog = jest.spyOn(console, 'log').mockImplementation();
    });

    afterEach(() => {
      consoleLog.mockRestore();
    });

    it('should log task lifecycle events under debug', async () => {
      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: tempDir, memoryBackend: 'memory', debug: true });
      const engine = await service.getTaskEngine();
      const task = Engine.createTask({ skill: 'echo', parameters: {} });

      await engine.executeTask(task);
      await service.shutdown();

      expect(consoleLog).toHaveBeenCalledWith(`[taskloom] task:started echo (${task.id})`);
      expect(consoleLog).toHaveBeenCalledWith(expect.stringMatching(/^\[taskloom\] task:completed \S+ in \d+ms$/));
    });

    it('should not log task events without debug', async () => {
      const service = DependencyInjectionService.getInstance();
      service.configure({ cwd: tempDir, memoryBackend: 'memory' });
      const engine = await service.getTaskEngine();
      const task = Engine.createTask({ skill: 'echo', parameters: {} });

      await engine.executeTask(task);
      await service.shutdown();

      expect(consoleLog).not.toHaveBeenCalledWith(`[taskloom] task:started echo (${task.id})`);
    });
  });

  describe('isStoreBackend', () => {
    it('should accept the three backends and nothing else', () => {
      expect(['yaml', 'json', 'memory', 'redis'].map(isStoreBackend)).toEqual([true, true, true, false]);
    });
  });
});
