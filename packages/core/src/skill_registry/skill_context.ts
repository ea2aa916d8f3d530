import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { ContextHandle } from '../context_manager';
import type { CredentialProvider } from '../credentials';
import { ContextCredentialProvider } from '../credentials';
import type { SkillContext } from './skill_registry.types';

export type SkillContextDependencies = {
  context: ContextHandle;
  skillName: string;
  credentials?: CredentialProvider;
  logger?: Logger;
};

/**
 * Binds a context handle for one skill instance. Without explicit
 * credentials, lookups go through the same context, then the environment.
 */
export function createSkillContext(deps: SkillContextDependencies): SkillContext {
  const { context } = deps;
  return {
    getContext: (key, scope) => context.getContext(key, scope),
    updateContext: (key, value, scope) => context.updateContext(key, value, scope),
    addMessage: (role, content, metadata) => context.addMessage(role, content, metadata),
    getRecentMessages: (count) => context.getRecentMessages(count),
    getFullContext: () => context.getFullContext(),
    credentials: deps.credentials ?? new ContextCredentialProvider({ context }),
    logger: deps.logger ?? createLogger(`[${deps.skillName}] `),
  };
}
