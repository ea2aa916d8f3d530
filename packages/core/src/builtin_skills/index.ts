import { StaticSkillSource } from '../skill_registry';
import { echoSkill } from './echo';
import { localShellSkill } from './local_shell';
import { githubAgentSkill } from './github_agent';

export { echoSkill } from './echo';
export * from './local_shell';
export * from './github_agent';

/**
 * Skills compiled into the package; the registry's default source.
 */
export const BUILTIN_SKILLS = new StaticSkillSource('builtin', [echoSkill, localShellSkill, githubAgentSkill]);
