export { TaskEngine } from './task_engine';
export { createTask } from './task_factory';
export { TaskEngineError, TaskStateError } from './errors';
export type {
  CreateTaskInput,
  SkillResolver,
  Task,
  TaskEngineDependencies,
  TaskStatus,
} from './task_engine.types';
