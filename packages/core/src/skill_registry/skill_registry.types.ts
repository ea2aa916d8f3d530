/**
 * SkillRegistry Types
 *
 * A skill is split in two contracts:
 * - SkillDefinition: static metadata plus a factory, readable without any context
 * - Skill: the executable instance, created bound to a SkillContext
 */

import type { Logger } from '../logger';
import type { ContextHandle } from '../context_manager';
import type { CredentialProvider } from '../credentials';
import type { JsonValue } from '../types';

export const PARAMETER_TYPES = ['string', 'number', 'boolean', 'object', 'array', 'any'] as const;

export type ParameterType = (typeof PARAMETER_TYPES)[number];

/**
 * Declared execution parameter. A parameter without `default` is required
 * unless `required: false` says otherwise.
 */
export type ParameterSpec = {
  type: ParameterType;
  default?: JsonValue;
  required?: boolean;
  enum?: string[];
  description?: string;
};

/**
 * Flat parameter mapping handed to Skill.execute(). Undeclared keys pass
 * through untouched.
 */
export type SkillParams = Record<string, JsonValue>;

/**
 * What a running skill may use: the context store surface, credential
 * lookup and a logger prefixed with the skill name.
 */
export interface SkillContext extends ContextHandle {
  readonly credentials: CredentialProvider;
  readonly logger: Logger;
}

export interface Skill {
  execute(params: SkillParams): Promise<JsonValue>;
}

export interface SkillDefinition {
  readonly name: string;
  readonly description: string;
  /** Defaults to "0.1.0" */
  readonly version?: string;
  /** Defaults to "taskloom" */
  readonly author?: string;
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
  create(context: SkillContext): Skill;
}

export type SkillParameterInfo = {
  type: ParameterType;
  required: boolean;
  default: JsonValue;
  description?: string;
};

export type SkillMetadata = {
  name: string;
  description: string;
  version: string;
  author: string;
  parameters: Record<string, SkillParameterInfo>;
};

/**
 * Where skill implementations come from. `load()` may return anything;
 * the registry keeps only candidates that are valid definitions.
 */
export interface SkillSource {
  readonly name: string;
  load(): Promise<readonly unknown[]>;
}

export type SkillRegistryOptions = {
  sources?: SkillSource[];
  /** Allows reload() to re-acquire a skill from its source (default: false) */
  hotReload?: boolean;
  logger?: Logger;
};
