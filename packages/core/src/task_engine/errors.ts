import type { TaskStatus } from './task_engine.types';

/**
 * Base error class for task engine errors
 */
export class TaskEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskEngineError';
    Object.setPrototypeOf(this, TaskEngineError.prototype);
  }
}

/**
 * A task was submitted that is not pending (running or already finished).
 */
export class TaskStateError extends TaskEngineError {
  public readonly taskId: string;
  public readonly status: TaskStatus;

  constructor(taskId: string, status: TaskStatus) {
    super(`Task ${taskId} cannot be executed from status '${status}'`);
    this.name = 'TaskStateError';
    this.taskId = taskId;
    this.status = status;
    Object.setPrototypeOf(this, TaskStateError.prototype);
  }
}
