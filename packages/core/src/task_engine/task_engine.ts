/**
 * TaskEngine - Task lifecycle and skill dispatch
 *
 * Resolves a task's skill through the registry, runs it bound to the shared
 * context store and records the outcome on the task. Finished tasks go to an
 * append-only history.
 *
 * Only thrown errors fail a task. A skill that returns an error-shaped value
 * (e.g. `{ error: '...' }`) completes normally.
 */

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { ContextHandle } from '../context_manager';
import type { CredentialProvider } from '../credentials';
import type { IEventStream, TaskloomEvent } from '../event_bus';
import { bindParameters, createSkillContext, SkillNotFoundError } from '../skill_registry';
import type { JsonValue } from '../types';
import { Semaphore } from '../utils/semaphore';
import { TaskStateError } from './errors';
import type { SkillResolver, Task, TaskEngineDependencies } from './task_engine.types';

const DEFAULT_MAX_CONCURRENT_TASKS = 5;
const EVENT_SOURCE = 'task_engine';

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

function copyTask(task: Task): Task {
  return structuredClone(task);
}

/**
 * @example
 * ```typescript
 * const engine = new TaskEngine({ contextManager, skillRegistry, maxConcurrentTasks: 3 });
 *
 * const result = await engine.executeTask(createTask({ skill: 'echo', parameters: { x: 1 } }));
 * const outcomes = await engine.runBatch(tasks); // PromiseSettledResult per task, input order
 * ```
 */
export class TaskEngine {
  private readonly context: ContextHandle;
  private readonly registry: SkillResolver;
  private readonly eventBus: IEventStream | undefined;
  private readonly credentials: CredentialProvider | undefined;
  private readonly logger: Logger;
  private readonly permits: Semaphore;

  private readonly activeTasks = new Map<string, Task>();
  private readonly history: Task[] = [];

  constructor(deps: TaskEngineDependencies) {
    this.context = deps.contextManager;
    this.registry = deps.skillRegistry;
    this.eventBus = deps.eventBus;
    this.credentials = deps.credentials;
    this.logger = deps.logger ?? createLogger('[Engine] ');
    this.permits = new Semaphore(deps.maxConcurrentTasks ?? DEFAULT_MAX_CONCURRENT_TASKS);
  }

  get maxConcurrentTasks(): number {
    return this.permits.size;
  }

  /**
   * Runs one task to completion.
   *
   * The task object is updated in place. A missing skill, invalid parameters
   * or a throwing skill mark it failed and the error is rethrown.
   *
   * @throws TaskStateError when the task is not pending
   */
  async executeTask(task: Task): Promise<JsonValue> {
    if (task.status !== 'pending') {
      throw new TaskStateError(task.id, task.status);
    }

    task.status = 'running';
    task.startedAt = new Date().toISOString();
    const startedMs = Date.now();
    this.activeTasks.set(task.id, task);
    this.logger.info(`Starting task ${task.id} (${task.skill})`);
    this.publish({
      type: 'task:started',
      timestamp: startedMs,
      source: EVENT_SOURCE,
      payload: { taskId: task.id, skill: task.skill, name: task.name },
    });

    try {
      const definition = this.registry.getSkill(task.skill);
      if (!definition) {
        throw new SkillNotFoundError(task.skill);
      }

      const params = bindParameters(definition, task.parameters);
      const skill = definition.create(
        createSkillContext({
          context: this.context,
          skillName: definition.name,
          ...(this.credentials ? { credentials: this.credentials } : {}),
        })
      );
      const result = await skill.execute(params);

      // a cancelled task keeps its status and records nothing
      if (this.activeTasks.has(task.id)) {
        task.status = 'completed';
        task.result = result;
        task.completedAt = new Date().toISOString();
        this.logger.info(`Task ${task.id} completed`);
        this.publish({
          type: 'task:completed',
          timestamp: Date.now(),
          source: EVENT_SOURCE,
          payload: { taskId: task.id, skill: task.skill, durationMs: Date.now() - startedMs },
        });
      }
      return result;
    } catch (error) {
      if (this.activeTasks.has(task.id)) {
        task.status = 'failed';
        task.error = errorMessage(error);
        task.completedAt = new Date().toISOString();
        this.logger.error(`Task ${task.id} failed: ${task.error}`);
        this.publish({
          type: 'task:failed',
          timestamp: Date.now(),
          source: EVENT_SOURCE,
          payload: { taskId: task.id, skill: task.skill, error: task.error },
        });
      }
      throw error;
    } finally {
      if (this.activeTasks.delete(task.id)) {
        this.history.push(copyTask(task));
      }
    }
  }

  /**
   * Runs tasks with at most `maxConcurrentTasks` running at once across every
   * batch on this engine. One outcome per task, in input order; a failing
   * task does not affect its siblings.
   */
  async runBatch(tasks: readonly Task[]): Promise<PromiseSettledResult<JsonValue>[]> {
    return Promise.allSettled(tasks.map((task) => this.permits.use(() => this.executeTask(task))));
  }

  getActiveTasks(): Task[] {
    return Array.from(this.activeTasks.values(), copyTask);
  }

  /**
   * Finished tasks, most recent last. A positive `limit` keeps only the
   * last entries; otherwise the whole history is returned.
   */
  getTaskHistory(limit?: number): Task[] {
    if (limit === undefined || limit <= 0) {
      return this.history.map(copyTask);
    }
    return this.history.slice(-limit).map(copyTask);
  }

  /**
   * Marks a running task cancelled and moves it to history.
   *
   * Bookkeeping only: the skill keeps running until it settles on its own,
   * and whoever awaits executeTask() still gets its outcome.
   */
  cancelTask(taskId: string): boolean {
    const task = this.activeTasks.get(taskId);
    if (!task) {
      return false;
    }

    const previousStatus = task.status;
    task.status = 'cancelled';
    task.completedAt = new Date().toISOString();
    this.activeTasks.delete(taskId);
    this.history.push(copyTask(task));
    this.logger.info(`Task ${taskId} cancelled`);
    this.publish({
      type: 'task:cancelled',
      timestamp: Date.now(),
      source: EVENT_SOURCE,
      payload: { taskId, skill: task.skill, previousStatus },
    });
    return true;
  }

  private publish(event: TaskloomEvent): void {
    this.eventBus?.publish(event);
  }
}
