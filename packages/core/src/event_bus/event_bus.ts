import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type {
  BaseEvent,
  EventHandler,
  EventOf,
  EventSubscription,
  TaskloomEvent,
  TaskloomEventType,
} from './types';

function generateSubscriptionId(): string {
  return `subscription:${randomUUID()}`;
}

function isEventOf<K extends TaskloomEventType>(event: BaseEvent, type: K): event is EventOf<K> {
  return event.type === type;
}

/**
 * Event Stream interface
 */
export interface IEventStream {
  publish(event: TaskloomEvent): void;

  subscribe<K extends TaskloomEventType>(eventType: K, handler: EventHandler<EventOf<K>>): EventSubscription;

  unsubscribe(subscriptionId: string): boolean;

  /**
   * Wait for all pending event handlers to complete
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

/**
 * In-process EventBus on Node's EventEmitter.
 *
 * publish() is fire-and-forget: handlers run in the background, their
 * errors are logged and never reach the publisher.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private subscriptions: Map<string, EventSubscription>;
  private pendingHandlers: Set<Promise<void>>;
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.emitter = new EventEmitter();
    this.subscriptions = new Map();
    this.pendingHandlers = new Set();
    this.logger = options.logger ?? createLogger('[EventBus] ');

    this.emitter.setMaxListeners(100);
  }

  publish(event: TaskloomEvent): void {
    if (!event.type || typeof event.type !== 'string') {
      throw new Error('Event must have a valid type string');
    }

    if (!event.timestamp || typeof event.timestamp !== 'number') {
      throw new Error('Event must have a valid timestamp number');
    }

    if (!event.source || typeof event.source !== 'string') {
      throw new Error('Event must have a valid source string');
    }

    this.emitter.emit(event.type, event);
  }

  subscribe<K extends TaskloomEventType>(eventType: K, handler: EventHandler<EventOf<K>>): EventSubscription {
    const listener = (event: BaseEvent): void => {
      if (!isEventOf(event, eventType)) return;

      const handlerPromise = (async () => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(`Error in event handler for ${eventType}: ${error instanceof Error ? error.message : String(error)}`);
        }
      })();

      this.pendingHandlers.add(handlerPromise);
      void handlerPromise.finally(() => {
        this.pendingHandlers.delete(handlerPromise);
      });
    };

    const subscription: EventSubscription = {
      id: generateSubscriptionId(),
      eventType,
      listener,
      metadata: {
        createdAt: Date.now(),
      },
    };

    this.emitter.on(eventType, listener);
    this.subscriptions.set(subscription.id, subscription);

    return subscription;
  }

  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }

    this.emitter.removeListener(subscription.eventType, subscription.listener);
    this.subscriptions.delete(subscriptionId);

    return true;
  }

  /**
   * Resolves once every handler started so far has settled, or after
   * `timeout` ms (default 5000) with a warning.
   *
   * @example
   * ```typescript
   * await engine.executeTask(task);   // publishes task:completed
   * await eventBus.waitForIdle();     // handlers are done
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        this.logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise((resolve) => setTimeout(resolve, 10)),
      ]);
    }
  }
}
