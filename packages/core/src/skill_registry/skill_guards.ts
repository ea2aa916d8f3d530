import { isJsonValue } from '../types';
import { isRequired } from './parameter_binder';
import { PARAMETER_TYPES } from './skill_registry.types';
import type { ParameterSpec, SkillDefinition, SkillMetadata, SkillParameterInfo } from './skill_registry.types';

export const DEFAULT_SKILL_VERSION = '0.1.0';
export const DEFAULT_SKILL_AUTHOR = 'taskloom';

function isParameterType(value: unknown): value is ParameterSpec['type'] {
  return typeof value === 'string' && PARAMETER_TYPES.some((type) => type === value);
}

function describeInvalidParameter(name: string, spec: unknown): string | null {
  if (typeof spec !== 'object' || spec === null) {
    return `parameter '${name}' is not an object`;
  }
  const type: unknown = Reflect.get(spec, 'type');
  if (!isParameterType(type)) {
    return `parameter '${name}' has unknown type '${String(type)}'`;
  }
  const defaultValue: unknown = Reflect.get(spec, 'default');
  if (defaultValue !== undefined && !isJsonValue(defaultValue)) {
    return `parameter '${name}' has a non-JSON default`;
  }
  const required: unknown = Reflect.get(spec, 'required');
  if (required !== undefined && typeof required !== 'boolean') {
    return `parameter '${name}' has a non-boolean required flag`;
  }
  const allowed: unknown = Reflect.get(spec, 'enum');
  if (allowed !== undefined && !(Array.isArray(allowed) && allowed.every((v) => typeof v === 'string'))) {
    return `parameter '${name}' has a malformed enum`;
  }
  return null;
}

/**
 * Explains why a candidate is not a usable SkillDefinition, or null if it is.
 */
export function describeInvalidSkill(candidate: unknown): string | null {
  if (typeof candidate !== 'object' || candidate === null) {
    return 'not an object';
  }
  const name: unknown = Reflect.get(candidate, 'name');
  if (typeof name !== 'string' || name.trim() === '') {
    return 'missing name';
  }
  if (typeof Reflect.get(candidate, 'description') !== 'string') {
    return `skill '${name}' has no description`;
  }
  if (typeof Reflect.get(candidate, 'create') !== 'function') {
    return `skill '${name}' has no create() factory`;
  }
  for (const key of ['version', 'author']) {
    const value: unknown = Reflect.get(candidate, key);
    if (value !== undefined && typeof value !== 'string') {
      return `skill '${name}' has a non-string ${key}`;
    }
  }
  const parameters: unknown = Reflect.get(candidate, 'parameters');
  if (typeof parameters !== 'object' || parameters === null || Array.isArray(parameters)) {
    return `skill '${name}' has no parameters map`;
  }
  for (const [paramName, spec] of Object.entries(parameters)) {
    const problem = describeInvalidParameter(paramName, spec);
    if (problem) return `skill '${name}': ${problem}`;
  }
  return null;
}

export function isSkillDefinition(candidate: unknown): candidate is SkillDefinition {
  return describeInvalidSkill(candidate) === null;
}

export function toParameterInfo(parameters: SkillDefinition['parameters']): Record<string, SkillParameterInfo> {
  const info: Record<string, SkillParameterInfo> = {};
  for (const [name, spec] of Object.entries(parameters)) {
    const required = isRequired(spec);
    info[name] = {
      type: spec.type,
      required,
      default: required ? null : spec.default ?? null,
      ...(spec.description !== undefined ? { description: spec.description } : {}),
    };
  }
  return info;
}

export function toSkillMetadata(definition: SkillDefinition): SkillMetadata {
  return {
    name: definition.name,
    description: definition.description,
    version: definition.version ?? DEFAULT_SKILL_VERSION,
    author: definition.author ?? DEFAULT_SKILL_AUTHOR,
    parameters: toParameterInfo(definition.parameters),
  };
}
