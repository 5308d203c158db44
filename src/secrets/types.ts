/**
 * Secrets Management Types
 *
 * Read-only view of the items held by the secret-management platform
 */

export const SECRET_TYPES = ['static', 'rotated', 'dynamic', 'other'] as const

export type SecretType = typeof SECRET_TYPES[number]

export interface SecretMetadata {
  lastModified?: string
  tags?: string[]
}

/**
 * One entry of an inventory listing. Never carries a value.
 */
export interface SecretSummary {
  path: string
  type: SecretType
  /** Item type as reported by the platform, e.g. STATIC_SECRET */
  itemType: string
  metadata?: SecretMetadata
}

export interface SecretDescription extends SecretSummary {
  lastVersion?: number
  description?: string
}

export type SecretValue =
  | {
      kind: 'simple'
      path: string
      type: SecretType
      value: string
    }
  | {
      kind: 'structured'
      path: string
      type: SecretType
      fields: Record<string, unknown>
    }

export type TypeCounts = Record<SecretType, number>

export interface TypeBreakdown {
  total: number
  counts: TypeCounts
  itemsByType: Record<SecretType, string[]>
}

/**
 * Client for the secret-management platform
 *
 * Implementations throw NotFoundError, AccessDeniedError,
 * UpstreamUnavailableError or TimeoutError; nothing else escapes.
 */
export interface SecretsClient {
  /**
   * List items under a folder path (`/` for the full inventory)
   */
  listItems(path?: string): Promise<SecretSummary[]>

  /**
   * Describe one item (type and metadata, no value)
   */
  describeItem(path: string): Promise<SecretDescription>

  /**
   * Read the value of an item using the endpoint for its type
   */
  getValue(path: string, type: SecretType): Promise<SecretValue>
}

/**
 * Map a platform item type onto the four-way classification
 */
export function classifyItemType(itemType: string): SecretType {
  const upper = itemType.toUpperCase()
  if (upper.includes('STATIC')) return 'static'
  if (upper.includes('ROTATED')) return 'rotated'
  if (upper.includes('DYNAMIC')) return 'dynamic'
  return 'other'
}

export function emptyTypeCounts(): TypeCounts {
  return { static: 0, rotated: 0, dynamic: 0, other: 0 }
}
