import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { SkillRegistry } from './skill_registry';
import { ModuleSkillSource, StaticSkillSource } from './skill_source';
import type { SkillDefinition, SkillSource } from './skill_registry.types';
import type { Logger } from '../logger';

function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function defineSkill(name: string, overrides: Partial<SkillDefinition> = {}): SkillDefinition {
  return {
    name,
    description: `${name} skill`,
    parameters: {},
    create: () => ({ execute: async (params) => params }),
    ...overrides,
  };
}

describe('SkillRegistry', () => {
  let logger: jest.Mocked<Logger>;

  beforeEach(() => {
    logger = createMockLogger();
  });

  describe('discover', () => {
    it('should register every valid definition from every source', async () => {
      const registry = new SkillRegistry({
        sources: [
          new StaticSkillSource('first', [defineSkill('echo')]),
          new StaticSkillSource('second', [defineSkill('local_shell')]),
        ],
        logger,
      });

      expect(await registry.discover()).toBe(2);
      expect(registry.listSkills().map((s) => s.name)).toEqual(['echo', 'local_shell']);
    });

    it('should skip invalid candidates with a warning and keep going', async () => {
      const registry = new SkillRegistry({
        sources: [
          new StaticSkillSource('mixed', [
            { description: 'no name', parameters: {}, create: () => undefined },
            { name: 'no_factory', description: 'd', parameters: {} },
            { name: 'bad_param', description: 'd', parameters: { x: { type: 'date' } }, create: () => undefined },
            defineSkill('echo'),
          ]),
        ],
        logger,
      });

      expect(await registry.discover()).toBe(1);
      expect(registry.getSkill('echo')).toBeDefined();
      expect(logger.warn).toHaveBeenCalledTimes(3);
      expect(logger.warn).toHaveBeenCalledWith('Skipping invalid skill from mixed: missing name');
      expect(logger.warn).toHaveBeenCalledWith("Skipping invalid skill from mixed: skill 'no_factory' has no create() factory");
      expect(logger.warn).toHaveBeenCalledWith(
        "Skipping invalid skill from mixed: skill 'bad_param': parameter 'x' has unknown type 'date'"
      );
    });

    it('should continue past a source that fails to load', async () => {
      const broken: SkillSource = {
        name: 'broken',
        load: jest.fn().mockRejectedValue(new Error('boom')),
      };
      const registry = new SkillRegistry({
        sources: [broken, new StaticSkillSource('ok', [defineSkill('echo')])],
        logger,
      });

      expect(await registry.discover()).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith('Failed to load skills from broken: boom');
    });

    it('should let the last registered definition win on a name collision', async () => {
      const registry = new SkillRegistry({
        sources: [
          new StaticSkillSource('a', [defineSkill('echo', { description: 'first' })]),
          new StaticSkillSource('b', [defineSkill('echo', { description: 'second' })]),
        ],
        logger,
      });

      await registry.discover();

      expect(registry.listSkills()).toHaveLength(1);
      expect(registry.getSkill('echo')?.description).toBe('second');
    });
  });

  describe('lookup', () => {
    it('should return undefined for unknown skills', () => {
      const registry = new SkillRegistry({ logger });

      expect(registry.getSkill('nonexistent')).toBeUndefined();
      expect(registry.hasSkill('nonexistent')).toBe(false);
      expect(registry.getSkillParameters('nonexistent')).toBeUndefined();
    });

    it('should describe metadata with default version and author', () => {
      const registry = new SkillRegistry({ logger });
      registry.register(
        defineSkill('local_shell', {
          parameters: {
            command: { type: 'string', description: 'Command line' },
            timeout: { type: 'number', default: 30 },
            cwd: { type: 'string', required: false },
          },
        })
      );

      expect(registry.listSkills()).toEqual([
        {
          name: 'local_shell',
          description: 'local_shell skill',
          version: '0.1.0',
          author: 'taskloom',
          parameters: {
            command: { type: 'string', required: true, default: null, description: 'Command line' },
            timeout: { type: 'number', required: false, default: 30 },
            cwd: { type: 'string', required: false, default: null },
          },
        },
      ]);
    });

    it('should keep declared version and author', () => {
      const registry = new SkillRegistry({ logger });
      registry.register(defineSkill('custom', { version: '2.0.0', author: 'someone' }));

      expect(registry.listSkills()[0]).toMatchObject({ version: '2.0.0', author: 'someone' });
    });

    it('should expose the parameter schema of one skill', () => {
      const registry = new SkillRegistry({ logger });
      registry.register(defineSkill('echo', { parameters: { text: { type: 'string', default: '' } } }));

      expect(registry.getSkillParameters('echo')).toEqual({
        text: { type: 'string', required: false, default: '' },
      });
    });
  });

  describe('reload', () => {
    it('should refuse to reload when hot reload is disabled', async () => {
      const registry = new SkillRegistry({ sources: [new StaticSkillSource('s', [defineSkill('echo')])], logger });
      await registry.discover();

      expect(await registry.reload('echo')).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Hot reload attempted while disabled');
    });

    it('should replace the entry with what the source provides now', async () => {
      let description = 'v1';
      const source: SkillSource = {
        name: 'changing',
        load: async () => [defineSkill('echo', { description })],
      };
      const registry = new SkillRegistry({ sources: [source], hotReload: true, logger });
      await registry.discover();
      description = 'v2';

      expect(await registry.reload('echo')).toBe(true);
      expect(registry.getSkill('echo')?.description).toBe('v2');
    });

    it('should return false when the skill is unknown or gone from its source', async () => {
      let candidates: unknown[] = [defineSkill('echo')];
      const source: SkillSource = { name: 'shrinking', load: async () => candidates };
      const registry = new SkillRegistry({ sources: [source], hotReload: true, logger });
      await registry.discover();
      candidates = [];

      expect(await registry.reload('missing')).toBe(false);
      expect(await registry.reload('echo')).toBe(false);
      expect(registry.getSkill('echo')).toBeDefined();
    });

    it('should return false for skills registered without a source', async () => {
      const registry = new SkillRegistry({ hotReload: true, logger });
      registry.register(defineSkill('manual'));

      expect(await registry.reload('manual')).toBe(false);
    });
  });
});

describe('ModuleSkillSource', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'skill-source-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load definitions exported under skills', async () => {
    await fs.writeFile(
      path.join(tempDir, 'my_skills.js'),
      [
        'module.exports.skills = [{',
        "  name: 'from_module',",
        "  description: 'Loaded from disk',",
        '  parameters: {},',
        "  create: () => ({ execute: async () => 'ok' }),",
        '}];',
      ].join('\n')
    );
    const source = new ModuleSkillSource('my_skills.js', tempDir);
    const registry = new SkillRegistry({ sources: [source], logger: createMockLogger() });

    await registry.discover();

    expect(source.name).toBe(`module:${path.join(tempDir, 'my_skills.js')}`);
    expect(registry.getSkill('from_module')?.description).toBe('Loaded from disk');
  });
});
