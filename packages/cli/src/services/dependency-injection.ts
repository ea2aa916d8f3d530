import { BuiltinSkills, Config, Context, Engine, EventBus, Logger, Skills, Store, Utils } from '@taskloom/core';

/**
 * Settings from the global CLI flags; they override taskloom.config.json.
 */
export type CliSettings = {
  cwd?: string;
  memoryBackend?: Store.StoreBackend;
  debug?: boolean;
};

/**
 * Dependency Injection Service for the taskloom CLI
 *
 * Builds the runtime (config, store, context, registry, engine) once per
 * process, in dependency order, and hands out the shared instances.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private settings: CliSettings = {};
  private config: Config.TaskloomConfig | null = null;
  private logger: Logger.Logger | null = null;
  private contextManager: Context.ContextManager | null = null;
  private skillRegistry: Skills.SkillRegistry | null = null;
  private taskEngine: Engine.TaskEngine | null = null;
  private eventBus: EventBus.EventBus | null = null;
  private stopEventLog: (() => void) | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Applies global flags. Must run before the first getter.
   */
  configure(settings: CliSettings): void {
    this.settings = { ...this.settings, ...settings };
  }

  getProjectRoot(): string {
    const cwd = this.settings.cwd ?? process.cwd();
    return Config.FsConfigStore.findProjectRoot(cwd) ?? cwd;
  }

  async getConfig(): Promise<Config.TaskloomConfig> {
    if (this.config) {
      return this.config;
    }

    const configManager = new Config.ConfigManager(new Config.FsConfigStore(this.getProjectRoot()));
    const config = await configManager.loadConfig();

    const backend = this.settings.memoryBackend;
    if (backend && backend !== config.memory.backend) {
      config.memory = { backend, path: Config.DEFAULT_MEMORY_PATHS[backend] };
    }

    this.config = config;
    return config;
  }

  async getLogger(): Promise<Logger.Logger> {
    if (this.logger) {
      return this.logger;
    }
    const config = await this.getConfig();
    const level = this.settings.debug ? 'debug' : config.logLevel;
    this.logger = Logger.createLogger('[taskloom] ', level);
    return this.logger;
  }

  /**
   * Context store over the configured backend, with a fresh session for
   * this CLI run.
   */
  async getContextManager(): Promise<Context.ContextManager> {
    if (this.contextManager) {
      return this.contextManager;
    }

    const config = await this.getConfig();
    const logger = await this.getLogger();
    const store = Store.createKeyValueStore(config.memory, { cwd: this.getProjectRoot(), logger });

    const contextManager = await Context.ContextManager.create(store, {
      maxHistoryLength: config.context.maxHistoryLength,
      contextWindow: config.context.contextWindow,
      logger,
    });
    await contextManager.createSession(Utils.generateSessionId('cli'));

    this.contextManager = contextManager;
    return contextManager;
  }

  /**
   * Registry loaded from the built-in skills plus every module listed under
   * `skills.modules`.
   */
  async getSkillRegistry(): Promise<Skills.SkillRegistry> {
    if (this.skillRegistry) {
      return this.skillRegistry;
    }

    const config = await this.getConfig();
    const logger = await this.getLogger();
    const root = this.getProjectRoot();

    const registry = new Skills.SkillRegistry({
      sources: [
        BuiltinSkills.BUILTIN_SKILLS,
        ...config.skills.modules.map((modulePath) => new Skills.ModuleSkillSource(modulePath, root)),
      ],
      hotReload: config.skills.hotReload,
      logger,
    });
    await registry.discover();

    this.skillRegistry = registry;
    return registry;
  }

  /**
   * Engine over the shared context and registry. Under `--debug` its task
   * lifecycle events are logged.
   */
  async getTaskEngine(): Promise<Engine.TaskEngine> {
    if (this.taskEngine) {
      return this.taskEngine;
    }

    const config = await this.getConfig();
    const logger = await this.getLogger();
    const eventBus = new EventBus.EventBus({ logger });
    if (this.settings.debug) {
      this.stopEventLog = EventBus.subscribeTaskEventLog(eventBus, logger);
    }

    this.eventBus = eventBus;
    this.taskEngine = new Engine.TaskEngine({
      contextManager: await this.getContextManager(),
      skillRegistry: await this.getSkillRegistry(),
      maxConcurrentTasks: config.engine.maxConcurrentTasks,
      eventBus,
      logger,
    });
    return this.taskEngine;
  }

  /**
   * Lets pending event handlers finish and drops the event log.
   */
  async shutdown(): Promise<void> {
    if (this.eventBus) {
      await this.eventBus.waitForIdle();
    }
    if (this.stopEventLog) {
      this.stopEventLog();
      this.stopEventLog = null;
    }
  }
}

const STORE_BACKENDS: readonly Store.StoreBackend[] = ['yaml', 'json', 'memory'];

export function isStoreBackend(value: string): value is Store.StoreBackend {
  return STORE_BACKENDS.some((backend) => backend === value);
}
