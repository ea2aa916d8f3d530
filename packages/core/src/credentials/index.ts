export type { CredentialProvider } from './credential_provider';
export { nonBlank, toEnvVarName } from './credential_provider';
export { ContextCredentialProvider } from './context_credential_provider';
export type { ContextCredentialProviderOptions } from './context_credential_provider';
export { StaticCredentialProvider } from './memory/static_credential_provider';
