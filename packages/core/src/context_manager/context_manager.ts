/**
 * ContextManager - Session and global context state
 *
 * Holds the global key-value context and every session (message history plus
 * session-scoped context) in memory, and writes both blobs to a KeyValueStore
 * after each mutation.
 *
 * Persistence is best-effort: a failed save is logged and reported through the
 * returned PersistResult, never thrown.
 */

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { KeyValueStore } from '../store';
import type { JsonObject, JsonValue } from '../types';
import { cloneJson } from '../types';
import {
  formatSchemaErrors,
  validateGlobalContextBlob,
  validateSessionsBlob,
} from './context_schema';
import type {
  ContextManagerOptions,
  ContextScope,
  IContextManager,
  Message,
  MessageRole,
  PersistResult,
  Session,
} from './context_manager.types';
import { InvalidScopeError, NoActiveSessionError } from './errors';

export const GLOBAL_CONTEXT_KEY = 'global_context';
export const SESSIONS_KEY = 'sessions';

const DEFAULT_MAX_HISTORY_LENGTH = 100;
const DEFAULT_CONTEXT_WINDOW = 10;

function assertScope(scope: string): asserts scope is ContextScope {
  if (scope !== 'global' && scope !== 'session') {
    throw new InvalidScopeError(scope);
  }
}

/**
 * Context Manager Class
 *
 * @example
 * ```typescript
 * const store = new FsStore({ basePath: './memory' });
 * const context = await ContextManager.create(store, { maxHistoryLength: 50 });
 *
 * await context.createSession('S1');
 * await context.addMessage('user', 'hello');
 * context.getRecentMessages(1); // [{ role: 'user', content: 'hello', ... }]
 * ```
 */
export class ContextManager implements IContextManager {
  private readonly store: KeyValueStore;
  private readonly maxHistoryLength: number;
  private readonly contextWindow: number;
  private readonly logger: Logger;

  private globalContext: JsonObject = {};
  private readonly sessions = new Map<string, Session>();
  private currentSessionId: string | null = null;
  private saveQueue: Promise<unknown> = Promise.resolve();
  private lastPersist: PersistResult | null = null;

  private constructor(store: KeyValueStore, options: ContextManagerOptions) {
    this.store = store;
    this.maxHistoryLength = options.maxHistoryLength ?? DEFAULT_MAX_HISTORY_LENGTH;
    this.contextWindow = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
    this.logger = options.logger ?? createLogger('[Context] ');
  }

  /**
   * Builds a manager and loads whatever the store already holds.
   * Load failures leave the manager empty.
   */
  static async create(store: KeyValueStore, options: ContextManagerOptions = {}): Promise<ContextManager> {
    const manager = new ContextManager(store, options);
    await manager.loadContext();
    return manager;
  }

  get lastPersistResult(): PersistResult | null {
    return this.lastPersist;
  }

  private async loadContext(): Promise<void> {
    try {
      const globalData = await this.store.load(GLOBAL_CONTEXT_KEY);
      if (globalData !== null) {
        if (validateGlobalContextBlob(globalData)) {
          this.globalContext = globalData;
        } else {
          this.logger.error(`Ignoring ${GLOBAL_CONTEXT_KEY}: ${formatSchemaErrors(validateGlobalContextBlob.errors)}`);
        }
      }

      const sessionsData = await this.store.load(SESSIONS_KEY);
      if (sessionsData !== null) {
        if (validateSessionsBlob(sessionsData)) {
          for (const session of Object.values(sessionsData)) {
            this.sessions.set(session.id, session);
          }
        } else {
          this.logger.error(`Ignoring ${SESSIONS_KEY}: ${formatSchemaErrors(validateSessionsBlob.errors)}`);
        }
      }

      this.logger.debug(`Context loaded (${this.sessions.size} sessions)`);
    } catch (error) {
      this.logger.error(`Failed to load context: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Snapshots state now and queues the write behind earlier saves so the
   * store sees mutations in call order.
   */
  private persist(): Promise<PersistResult> {
    const globalSnapshot = cloneJson(this.globalContext);
    const sessionsSnapshot: Record<string, Session> = {};
    for (const [id, session] of this.sessions) {
      sessionsSnapshot[id] = {
        ...cloneJson(session),
        messages: cloneJson(session.messages.slice(-this.maxHistoryLength)),
      };
    }

    const result = this.saveQueue.then(async (): Promise<PersistResult> => {
      let persisted = false;
      try {
        const globalSaved = await this.store.save(GLOBAL_CONTEXT_KEY, globalSnapshot);
        const sessionsSaved = await this.store.save(SESSIONS_KEY, sessionsSnapshot);
        persisted = globalSaved && sessionsSaved;
        if (persisted) {
          this.logger.debug('Context saved');
        } else {
          this.logger.error('Failed to save context');
        }
      } catch (error) {
        this.logger.error(`Failed to save context: ${error instanceof Error ? error.message : String(error)}`);
      }
      this.lastPersist = { persisted };
      return { persisted };
    });
    this.saveQueue = result;
    return result;
  }

  private requireCurrentSession(operation: string): Session {
    const session = this.currentSessionId === null ? undefined : this.sessions.get(this.currentSessionId);
    if (!session) {
      throw new NoActiveSessionError(operation);
    }
    return session;
  }

  // ─────────────────────────────────────────────────────────
  // Sessions
  // ─────────────────────────────────────────────────────────

  /**
   * Creates a session, makes it current and persists. An existing session
   * with the same id is replaced.
   */
  async createSession(id: string): Promise<Session> {
    const session: Session = {
      id,
      startedAt: new Date().toISOString(),
      messages: [],
      context: {},
      active: true,
    };
    this.sessions.set(id, session);
    this.currentSessionId = id;
    await this.persist();
    return cloneJson(session);
  }

  getSession(id: string): Session | undefined {
    const session = this.sessions.get(id);
    return session ? cloneJson(session) : undefined;
  }

  getCurrentSession(): Session | undefined {
    return this.currentSessionId === null ? undefined : this.getSession(this.currentSessionId);
  }

  listSessions(): Session[] {
    return Array.from(this.sessions.values(), (session) => cloneJson(session));
  }

  setCurrentSession(id: string): boolean {
    if (!this.sessions.has(id)) {
      return false;
    }
    this.currentSessionId = id;
    return true;
  }

  /**
   * Wipes messages and context of a session and marks it inactive.
   * The session itself stays in the store.
   */
  async clearSession(id: string): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }
    session.messages = [];
    session.context = {};
    session.active = false;
    await this.persist();
    return true;
  }

  // ─────────────────────────────────────────────────────────
  // Messages
  // ─────────────────────────────────────────────────────────

  async addMessage(role: MessageRole, content: string, metadata: JsonObject = {}): Promise<PersistResult> {
    const session = this.requireCurrentSession('addMessage');
    const message: Message = {
      role,
      content,
      timestamp: new Date().toISOString(),
      metadata: cloneJson(metadata),
    };
    session.messages.push(message);
    if (session.messages.length > this.maxHistoryLength) {
      session.messages = session.messages.slice(-this.maxHistoryLength);
    }
    return this.persist();
  }

  /**
   * Last `count` messages of the current session, oldest first. A count
   * below 1 means the context window. Empty when no session is current.
   */
  getRecentMessages(count: number = this.contextWindow): Message[] {
    if (this.currentSessionId === null) {
      return [];
    }
    const size = count >= 1 ? count : this.contextWindow;
    const session = this.sessions.get(this.currentSessionId);
    if (!session) {
      return [];
    }
    return cloneJson(session.messages.slice(-size));
  }

  // ─────────────────────────────────────────────────────────
  // Key-value context
  // ─────────────────────────────────────────────────────────

  async updateContext(key: string, value: JsonValue, scope: string = 'session'): Promise<PersistResult> {
    assertScope(scope);
    if (scope === 'global') {
      this.globalContext[key] = cloneJson(value);
    } else {
      this.requireCurrentSession('updateContext').context[key] = cloneJson(value);
    }
    return this.persist();
  }

  /**
   * Reads one scope only. Unknown scope names throw InvalidScopeError. Session scope without a current session is absent.
   */
  getContext(key: string, scope: string = 'session'): JsonValue | undefined {
    assertScope(scope);
    let source: JsonObject | undefined;
    if (scope === 'global') {
      source = this.globalContext;
    } else {
      source = this.currentSessionId === null ? undefined : this.sessions.get(this.currentSessionId)?.context;
    }
    if (!source || !Object.prototype.hasOwnProperty.call(source, key)) {
      return undefined;
    }
    const value = source[key];
    return value === undefined ? undefined : cloneJson(value);
  }

  /**
   * Global context overlaid with the current session's context.
   */
  getFullContext(): JsonObject {
    const merged: JsonObject = cloneJson(this.globalContext);
    const session = this.currentSessionId === null ? undefined : this.sessions.get(this.currentSessionId);
    if (session) {
      Object.assign(merged, cloneJson(session.context));
    }
    return merged;
  }
}
