export { EventBus } from './event_bus';
export type { IEventStream } from './event_bus';
export { subscribeTaskEventLog } from './task_event_log';
export type {
  BaseEvent,
  EventHandler,
  EventOf,
  EventSubscription,
  TaskCancelledEvent,
  TaskCompletedEvent,
  TaskFailedEvent,
  TaskloomEvent,
  TaskloomEventType,
  TaskStartedEvent,
} from './types';
