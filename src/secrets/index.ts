export * from './types'
export { AkeylessSecretsClient, toFolderPath, toItemName, toSecretValue } from './akeyless-client'
export type { AkeylessClientConfig } from './akeyless-client'
export { InMemorySecretsClient } from './in-memory-secrets'
export type { InMemorySecret } from './in-memory-secrets'
