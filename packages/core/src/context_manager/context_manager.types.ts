/**
 * ContextManager Types
 */

import type { Logger } from '../logger';
import type { IsoTimestamp, JsonObject, JsonValue } from '../types';

export type MessageRole = 'system' | 'user' | 'assistant';

/**
 * A single entry in a session's conversation history.
 */
export type Message = {
  role: MessageRole;
  content: string;
  timestamp: IsoTimestamp;
  metadata: JsonObject;
};

/**
 * A bounded conversation scope with its own history and key-value context.
 */
export type Session = {
  id: string;
  startedAt: IsoTimestamp;
  messages: Message[];
  context: JsonObject;
  active: boolean;
};

export type ContextScope = 'global' | 'session';

/**
 * Outcome of the save that followed a mutation. `persisted: false` means the
 * in-memory change happened but the store did not accept it.
 */
export type PersistResult = {
  persisted: boolean;
};

export type ContextManagerOptions = {
  /** Messages kept per session, oldest evicted first (default: 100) */
  maxHistoryLength?: number;
  /** Messages returned by getRecentMessages() without a count (default: 10) */
  contextWindow?: number;
  logger?: Logger;
};

/**
 * The part of the context store a skill may touch while it runs.
 */
export interface ContextHandle {
  getContext(key: string, scope?: ContextScope): JsonValue | undefined;
  updateContext(key: string, value: JsonValue, scope?: ContextScope): Promise<PersistResult>;
  addMessage(role: MessageRole, content: string, metadata?: JsonObject): Promise<PersistResult>;
  getRecentMessages(count?: number): Message[];
  getFullContext(): JsonObject;
}

export interface IContextManager extends ContextHandle {
  createSession(id: string): Promise<Session>;
  getSession(id: string): Session | undefined;
  getCurrentSession(): Session | undefined;
  listSessions(): Session[];
  setCurrentSession(id: string): boolean;
  clearSession(id: string): Promise<boolean>;
  readonly lastPersistResult: PersistResult | null;
}
