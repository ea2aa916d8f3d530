/**
 * TaskEngine Types
 */

import type { Logger } from '../logger';
import type { ContextHandle } from '../context_manager';
import type { CredentialProvider } from '../credentials';
import type { IEventStream } from '../event_bus';
import type { SkillDefinition, SkillParams } from '../skill_registry';
import type { IsoTimestamp, JsonValue } from '../types';

/**
 * pending → running → completed | failed | cancelled
 */
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export type Task = {
  id: string;
  name: string;
  skill: string;
  parameters: SkillParams;
  status: TaskStatus;
  createdAt: IsoTimestamp;
  startedAt?: IsoTimestamp;
  completedAt?: IsoTimestamp;
  /** Present only when completed */
  result?: JsonValue;
  /** Present only when failed */
  error?: string;
};

export type CreateTaskInput = {
  skill: string;
  /** Merged into parameters as `action` */
  action?: string;
  parameters?: SkillParams;
  /** Defaults to `<skill>.<action>` or the skill name */
  name?: string;
};

/**
 * The lookup the engine needs from a skill registry.
 */
export interface SkillResolver {
  getSkill(name: string): SkillDefinition | undefined;
}

export type TaskEngineDependencies = {
  contextManager: ContextHandle;
  skillRegistry: SkillResolver;
  /** Permits shared by every runBatch() call (default: 5) */
  maxConcurrentTasks?: number;
  eventBus?: IEventStream;
  /** Credential lookup handed to skills; defaults to context then environment */
  credentials?: CredentialProvider;
  logger?: Logger;
};
