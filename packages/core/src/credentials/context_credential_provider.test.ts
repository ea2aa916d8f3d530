import { ContextCredentialProvider } from './context_credential_provider';
import { StaticCredentialProvider } from './memory/static_credential_provider';
import { toEnvVarName } from './credential_provider';
import { ContextManager } from '../context_manager';
import { MemoryStore } from '../store/memory';

describe('ContextCredentialProvider', () => {
  let context: ContextManager;

  beforeEach(async () => {
    context = await ContextManager.create(new MemoryStore());
  });

  it('should prefer the session value over global and environment', async () => {
    await context.updateContext('github_token', 'from-global', 'global');
    await context.createSession('S1');
    await context.updateContext('github_token', 'from-session', 'session');
    const provider = new ContextCredentialProvider({ context, env: { GITHUB_TOKEN: 'from-env' } });

    expect(await provider.getCredential('github_token')).toBe('from-session');
  });

  it('should fall back to the global value', async () => {
    await context.updateContext('github_token', 'from-global', 'global');
    const provider = new ContextCredentialProvider({ context, env: { GITHUB_TOKEN: 'from-env' } });

    expect(await provider.getCredential('github_token')).toBe('from-global');
  });

  it('should fall back to the environment under the upper-cased name', async () => {
    const provider = new ContextCredentialProvider({ context, env: { GITHUB_TOKEN: '  test-token  ' } });

    expect(await provider.getCredential('github_token')).toBe('test-token');
  });

  it('should treat blank and non-string context values as absent', async () => {
    await context.updateContext('github_token', '   ', 'global');
    await context.createSession('S1');
    await context.updateContext('github_token', 42, 'session');
    const provider = new ContextCredentialProvider({ context, env: { GITHUB_TOKEN: 'from-env' } });

    expect(await provider.getCredential('github_token')).toBe('from-env');
  });

  it('should return null when nothing is configured', async () => {
    const provider = new ContextCredentialProvider({ env: {} });

    expect(await provider.getCredential('github_token')).toBeNull();
  });

  it('should sanitize names for the environment lookup', () => {
    expect(toEnvVarName('github_token')).toBe('GITHUB_TOKEN');
    expect(toEnvVarName('api-key.v2')).toBe('API_KEY_V2');
  });
});

describe('StaticCredentialProvider', () => {
  it('should serve configured values and ignore blank ones', async () => {
    const provider = new StaticCredentialProvider({ github_token: 'test-token', empty: '' });
    provider.set('other', 'test-other');

    expect(await provider.getCredential('github_token')).toBe('test-token');
    expect(await provider.getCredential('other')).toBe('test-other');
    expect(await provider.getCredential('empty')).toBeNull();
    expect(await provider.getCredential('missing')).toBeNull();
  });
});
