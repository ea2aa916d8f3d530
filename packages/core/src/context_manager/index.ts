export { ContextManager, GLOBAL_CONTEXT_KEY, SESSIONS_KEY } from './context_manager';
export { ContextError, InvalidScopeError, NoActiveSessionError } from './errors';
export type {
  ContextHandle,
  ContextManagerOptions,
  ContextScope,
  IContextManager,
  Message,
  MessageRole,
  PersistResult,
  Session,
} from './context_manager.types';
