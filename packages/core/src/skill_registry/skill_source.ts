import * as path from 'path';
import type { SkillSource } from './skill_registry.types';

/**
 * Source over a list compiled into the program.
 */
export class StaticSkillSource implements SkillSource {
  readonly name: string;
  private readonly candidates: readonly unknown[];

  constructor(name: string, candidates: readonly unknown[]) {
    this.name = name;
    this.candidates = candidates;
  }

  async load(): Promise<readonly unknown[]> {
    return [...this.candidates];
  }
}

/**
 * Source over a CommonJS module exporting `skills` (an array of definitions)
 * or a single definition as its default export.
 *
 * Every load() after the first drops the module from the require cache, so a
 * reload picks up edits on disk.
 */
export class ModuleSkillSource implements SkillSource {
  readonly name: string;
  private readonly modulePath: string;
  private loaded = false;

  constructor(modulePath: string, cwd: string = process.cwd()) {
    this.modulePath = path.resolve(cwd, modulePath);
    this.name = `module:${this.modulePath}`;
  }

  async load(): Promise<readonly unknown[]> {
    if (this.loaded) {
      delete require.cache[require.resolve(this.modulePath)];
    }
    const mod: unknown = await import(this.modulePath);
    this.loaded = true;

    if (typeof mod !== 'object' || mod === null) {
      return [];
    }
    const skills: unknown = Reflect.get(mod, 'skills');
    if (Array.isArray(skills)) {
      return skills;
    }
    const fallback: unknown = Reflect.get(mod, 'default');
    return fallback === undefined ? [] : [fallback];
  }
}
