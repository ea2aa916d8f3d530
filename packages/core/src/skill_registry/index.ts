export { SkillRegistry } from './skill_registry';
export { ModuleSkillSource, StaticSkillSource } from './skill_source';
export { bindParameters, toParametersSchema } from './parameter_binder';
export { createSkillContext } from './skill_context';
export type { SkillContextDependencies } from './skill_context';
export {
  DEFAULT_SKILL_AUTHOR,
  DEFAULT_SKILL_VERSION,
  describeInvalidSkill,
  isSkillDefinition,
  toSkillMetadata,
} from './skill_guards';
export { SkillError, SkillNotFoundError, SkillParameterError } from './errors';
export { PARAMETER_TYPES } from './skill_registry.types';
export type {
  ParameterSpec,
  ParameterType,
  Skill,
  SkillContext,
  SkillDefinition,
  SkillMetadata,
  SkillParameterInfo,
  SkillParams,
  SkillRegistryOptions,
  SkillSource,
} from './skill_registry.types';
