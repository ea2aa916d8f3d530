import type { Logger } from '../logger';
import type { IEventStream } from './event_bus';

/**
 * Writes every task lifecycle event to `logger` at debug level.
 * Returns a function that removes the subscriptions again.
 */
export function subscribeTaskEventLog(bus: IEventStream, logger: Logger): () => void {
  const subscriptions = [
    bus.subscribe('task:started', ({ payload }) => {
      logger.debug(`task:started ${payload.name} (${payload.taskId})`);
    }),
    bus.subscribe('task:completed', ({ payload }) => {
      logger.debug(`task:completed ${payload.taskId} in ${payload.durationMs}ms`);
    }),
    bus.subscribe('task:failed', ({ payload }) => {
      logger.debug(`task:failed ${payload.taskId}: ${payload.error}`);
    }),
    bus.subscribe('task:cancelled', ({ payload }) => {
      logger.debug(`task:cancelled ${payload.taskId} (was ${payload.previousStatus})`);
    }),
  ];

  return () => {
    for (const subscription of subscriptions) {
      bus.unsubscribe(subscription.id);
    }
  };
}
