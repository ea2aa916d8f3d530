/**
 * CredentialProvider Interface
 *
 * Abstracts where skills find secrets such as access tokens. The default
 * lookup walks the context store first and falls back to the process
 * environment.
 *
 * @module credentials
 */

/**
 * Interface for resolving named credentials.
 *
 * @example
 * ```typescript
 * const credentials = new ContextCredentialProvider({ context });
 *
 * const token = await credentials.getCredential('github_token');
 * if (!token) {
 *   return { error: 'GitHub token not configured' };
 * }
 * ```
 */
export interface CredentialProvider {
  /**
   * Resolves a credential by name.
   * @returns The trimmed value, or null when no source has a non-blank value
   */
  getCredential(name: string): Promise<string | null>;
}

/**
 * Builds the environment variable name for a credential:
 * upper-cased, every non-alphanumeric character replaced by `_`.
 *
 * @example toEnvVarName('github_token') // 'GITHUB_TOKEN'
 */
export function toEnvVarName(name: string): string {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

export function nonBlank(value: unknown): string | null {
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  return value.trim();
}
