/**
 * SkillRegistry - Skill discovery and lookup
 *
 * Collects SkillDefinitions from the configured sources, keyed by name
 * (last registered wins), and serves their metadata without binding any
 * context.
 */

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { describeInvalidSkill, isSkillDefinition, toParameterInfo, toSkillMetadata } from './skill_guards';
import type {
  SkillDefinition,
  SkillMetadata,
  SkillParameterInfo,
  SkillRegistryOptions,
  SkillSource,
} from './skill_registry.types';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * @example
 * ```typescript
 * const registry = new SkillRegistry({ sources: [BUILTIN_SKILLS] });
 * await registry.discover();
 *
 * registry.listSkills().map((s) => s.name); // ['echo', 'local_shell', 'github_agent']
 * const shell = registry.getSkill('local_shell');
 * ```
 */
export class SkillRegistry {
  private readonly sources: SkillSource[];
  private readonly hotReload: boolean;
  private readonly logger: Logger;
  private readonly skills = new Map<string, SkillDefinition>();
  private readonly origins = new Map<string, SkillSource>();

  constructor(options: SkillRegistryOptions = {}) {
    this.sources = options.sources ?? [];
    this.hotReload = options.hotReload ?? false;
    this.logger = options.logger ?? createLogger('[Skills] ');
  }

  /**
   * Loads every source and registers each valid candidate. A failing source
   * or an invalid candidate is skipped with a warning.
   *
   * @returns Number of skills registered by this call
   */
  async discover(): Promise<number> {
    let registered = 0;
    for (const source of this.sources) {
      this.logger.debug(`Discovering skills in ${source.name}`);
      let candidates: readonly unknown[];
      try {
        candidates = await source.load();
      } catch (error) {
        this.logger.warn(`Failed to load skills from ${source.name}: ${errorMessage(error)}`);
        continue;
      }

      for (const candidate of candidates) {
        if (!isSkillDefinition(candidate)) {
          this.logger.warn(`Skipping invalid skill from ${source.name}: ${describeInvalidSkill(candidate) ?? 'unknown reason'}`);
          continue;
        }
        this.register(candidate, source);
        registered++;
      }
    }
    return registered;
  }

  /**
   * Registers a definition, replacing any previous one with the same name.
   */
  register(definition: SkillDefinition, source?: SkillSource): void {
    if (this.skills.has(definition.name)) {
      this.logger.debug(`Replacing skill: ${definition.name}`);
    }
    this.skills.set(definition.name, definition);
    if (source) {
      this.origins.set(definition.name, source);
    } else {
      this.origins.delete(definition.name);
    }
    this.logger.info(`Loaded skill: ${definition.name}`);
  }

  getSkill(name: string): SkillDefinition | undefined {
    return this.skills.get(name);
  }

  hasSkill(name: string): boolean {
    return this.skills.has(name);
  }

  /**
   * Metadata of every registered skill, in registration order.
   */
  listSkills(): SkillMetadata[] {
    return Array.from(this.skills.values(), toSkillMetadata);
  }

  getSkillParameters(name: string): Record<string, SkillParameterInfo> | undefined {
    const definition = this.skills.get(name);
    return definition ? toParameterInfo(definition.parameters) : undefined;
  }

  /**
   * Re-acquires a skill from the source it was discovered in.
   * False when hot reload is off, the skill has no source, or the source no
   * longer provides it.
   */
  async reload(name: string): Promise<boolean> {
    if (!this.hotReload) {
      this.logger.warn('Hot reload attempted while disabled');
      return false;
    }
    const source = this.origins.get(name);
    if (!source) {
      return false;
    }

    try {
      const candidates = await source.load();
      const replacement = candidates.find(
        (candidate): candidate is SkillDefinition => isSkillDefinition(candidate) && candidate.name === name
      );
      if (!replacement) {
        return false;
      }
      this.skills.set(name, replacement);
      this.logger.info(`Reloaded skill: ${name}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to reload skill ${name}: ${errorMessage(error)}`);
      return false;
    }
  }
}
