/**
 * StaticCredentialProvider - In-memory CredentialProvider for testing
 *
 * @module credentials/memory/static_credential_provider
 */

import type { CredentialProvider } from '../credential_provider';
import { nonBlank } from '../credential_provider';

/**
 * Serves credentials from a fixed map, no I/O.
 *
 * @example
 * ```typescript
 * const credentials = new StaticCredentialProvider({ github_token: 'test-token' });
 * ```
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly values: Map<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
  }

  async getCredential(name: string): Promise<string | null> {
    return nonBlank(this.values.get(name));
  }

  /** Test helper */
  set(name: string, value: string): void {
    this.values.set(name, value);
  }
}
