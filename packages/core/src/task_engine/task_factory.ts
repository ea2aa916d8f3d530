import { generateTaskId } from '../utils/id_generator';
import type { CreateTaskInput, Task } from './task_engine.types';

/**
 * Builds a pending Task ready for TaskEngine.executeTask().
 *
 * @example
 * createTask({ skill: 'local_shell', action: 'run', parameters: { command: 'ls' } });
 * // { id: '1716900000000-task-local-shell-run-9f2c01ab', name: 'local_shell.run',
 * //   parameters: { command: 'ls', action: 'run' }, status: 'pending', ... }
 */
export function createTask(input: CreateTaskInput): Task {
  const name = input.name ?? (input.action ? `${input.skill}.${input.action}` : input.skill);
  const now = Date.now();
  return {
    id: generateTaskId(name, now),
    name,
    skill: input.skill,
    parameters: {
      ...input.parameters,
      ...(input.action !== undefined ? { action: input.action } : {}),
    },
    status: 'pending',
    createdAt: new Date(now).toISOString(),
  };
}
