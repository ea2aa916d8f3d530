import type { SkillDefinition } from '../../skill_registry';

/**
 * Returns its parameters unchanged. Useful for checking the engine and the
 * registry without side effects.
 */
export const echoSkill: SkillDefinition = {
  name: 'echo',
  description: 'Returns its parameters unchanged',
  parameters: {},
  create: () => ({
    execute: async (params) => params,
  }),
};
