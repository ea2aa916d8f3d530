/**
 * Event Bus types for task lifecycle notifications
 */

import type { TaskStatus } from '../task_engine/task_engine.types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp (ms since epoch) */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Component that emitted the event */
  source: string;
};

export type TaskStartedEvent = BaseEvent & {
  type: 'task:started';
  payload: {
    taskId: string;
    skill: string;
    name: string;
  };
};

export type TaskCompletedEvent = BaseEvent & {
  type: 'task:completed';
  payload: {
    taskId: string;
    skill: string;
    durationMs: number;
  };
};

export type TaskFailedEvent = BaseEvent & {
  type: 'task:failed';
  payload: {
    taskId: string;
    skill: string;
    error: string;
  };
};

export type TaskCancelledEvent = BaseEvent & {
  type: 'task:cancelled';
  payload: {
    taskId: string;
    skill: string;
    /** Status the task was in when cancellation was requested */
    previousStatus: TaskStatus;
  };
};

export type TaskloomEvent =
  | TaskStartedEvent
  | TaskCompletedEvent
  | TaskFailedEvent
  | TaskCancelledEvent;

export type TaskloomEventType = TaskloomEvent['type'];

export type EventOf<K extends TaskloomEventType> = Extract<TaskloomEvent, { type: K }>;

export type EventHandler<T extends BaseEvent = BaseEvent> = (event: T) => void | Promise<void>;

export type EventSubscription = {
  id: string;
  eventType: string;
  /** Listener registered on the emitter (wraps the caller's handler) */
  listener: (event: BaseEvent) => void;
  metadata: {
    createdAt: number;
  };
};
