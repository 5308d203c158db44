/**
 * Intent Types
 *
 * The fixed enumeration a user utterance is classified into
 */

import type { SecretType } from '../secrets/types'

export const INTENTS = [
  'list_secrets',
  'get_secret',
  'count_by_type',
  'search_secrets',
  'unknown',
] as const

export type Intent = typeof INTENTS[number]

export interface IntentParams {
  /** Secret path for get_secret */
  path?: string
  /** Folder prefix for search_secrets */
  pathPrefix?: string
  /** Type filter for search_secrets, type hint for get_secret */
  type?: SecretType
}

export interface ClassifiedIntent {
  intent: Intent
  params: IntentParams
}

export function unknownIntent(): ClassifiedIntent {
  return { intent: 'unknown', params: {} }
}
