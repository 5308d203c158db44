export { SecretOperations, matchesPrefix, normalizePrefix, tallyByType } from './secret-operations'
export type { FacadeResult } from './secret-operations'
