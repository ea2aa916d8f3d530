/**
 * Base error for context store operations.
 */
export class ContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContextError';
    Object.setPrototypeOf(this, ContextError.prototype);
  }
}

/**
 * Raised by operations that need a current session when none is set.
 */
export class NoActiveSessionError extends ContextError {
  constructor(operation: string) {
    super(`No active session for ${operation}`);
    this.name = 'NoActiveSessionError';
    Object.setPrototypeOf(this, NoActiveSessionError.prototype);
  }
}

export class InvalidScopeError extends ContextError {
  public readonly scope: string;

  constructor(scope: string) {
    super(`Invalid scope '${scope}': expected 'global' or 'session'`);
    this.name = 'InvalidScopeError';
    this.scope = scope;
    Object.setPrototypeOf(this, InvalidScopeError.prototype);
  }
}
