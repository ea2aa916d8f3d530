/**
 * ContextCredentialProvider - context store, then environment
 *
 * Lookup order for `getCredential(name)`:
 * 1. current session context under `name`
 * 2. global context under `name`
 * 3. `env[toEnvVarName(name)]`
 *
 * Blank strings and non-string values count as absent.
 *
 * @module credentials/context_credential_provider
 */

import type { ContextHandle } from '../context_manager';
import type { CredentialProvider } from './credential_provider';
import { nonBlank, toEnvVarName } from './credential_provider';

export interface ContextCredentialProviderOptions {
  /** Context to consult first; omitted means environment only */
  context?: Pick<ContextHandle, 'getContext'>;
  /** Environment object to read from (default: process.env) */
  env?: Record<string, string | undefined>;
}

export class ContextCredentialProvider implements CredentialProvider {
  private readonly context: Pick<ContextHandle, 'getContext'> | undefined;
  private readonly env: Record<string, string | undefined>;

  constructor(options: ContextCredentialProviderOptions = {}) {
    this.context = options.context;
    this.env = options.env ?? process.env;
  }

  async getCredential(name: string): Promise<string | null> {
    if (this.context) {
      const fromSession = nonBlank(this.context.getContext(name, 'session'));
      if (fromSession) return fromSession;

      const fromGlobal = nonBlank(this.context.getContext(name, 'global'));
      if (fromGlobal) return fromGlobal;
    }

    return nonBlank(this.env[toEnvVarName(name)]);
  }
}
