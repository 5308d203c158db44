/**
 * Secret Operations
 *
 * Read-only façade over a SecretsClient. Each operation is one client call,
 * except countByType, searchSecrets and breakdownByType, which aggregate
 * the full listing on this side.
 */

import type {
  SecretDescription,
  SecretsClient,
  SecretSummary,
  SecretType,
  SecretValue,
  TypeBreakdown,
  TypeCounts,
} from '../secrets/types'
import { emptyTypeCounts } from '../secrets/types'

export type FacadeResult =
  | { operation: 'list_secrets'; secrets: SecretSummary[] }
  | { operation: 'get_secret_value'; value: SecretValue }
  | { operation: 'count_by_type'; counts: TypeCounts }
  | { operation: 'search_secrets'; secrets: SecretSummary[]; pathPrefix?: string; type?: SecretType }

/**
 * Canonical form used for prefix matching: leading slash, no trailing
 * slash or wildcard. The root folder is the empty string.
 */
export function normalizePrefix(prefix: string | undefined): string {
  if (prefix === undefined) return ''
  const trimmed = prefix.trim().replace(/^\/+/, '').replace(/[/*]+$/, '')
  return trimmed === '' ? '' : `/${trimmed}`
}

/**
 * Folder match: `/prod` matches `/prod` and `/prod/db`, not `/production`
 */
export function matchesPrefix(path: string, prefix: string | undefined): boolean {
  const normalized = normalizePrefix(prefix)
  if (normalized === '') return true

  const target = normalizePrefix(path)
  return target === normalized || target.startsWith(`${normalized}/`)
}

export class SecretOperations {
  constructor(private readonly client: SecretsClient) {}

  /**
   * Full inventory visible to the configured credentials
   */
  async listSecrets(): Promise<SecretSummary[]> {
    return this.client.listItems('/')
  }

  /**
   * Read one value. Without a type hint the item is described first so the
   * right endpoint is used; `other` items go through the static endpoint.
   */
  async getSecretValue(path: string, typeHint?: SecretType): Promise<SecretValue> {
    const type = typeHint ?? (await this.client.describeItem(path)).type
    return this.client.getValue(path, type)
  }

  async describeSecret(path: string): Promise<SecretDescription> {
    return this.client.describeItem(path)
  }

  /**
   * Tally of the listing; every type is present, zero-filled
   */
  async countByType(): Promise<TypeCounts> {
    return tallyByType(await this.listSecrets())
  }

  async searchSecrets(pathPrefix?: string, type?: SecretType): Promise<SecretSummary[]> {
    const secrets = await this.listSecrets()
    return secrets.filter(secret =>
      matchesPrefix(secret.path, pathPrefix) && (type === undefined || secret.type === type)
    )
  }

  async breakdownByType(): Promise<TypeBreakdown> {
    const secrets = await this.listSecrets()
    const itemsByType: Record<SecretType, string[]> = { static: [], rotated: [], dynamic: [], other: [] }
    for (const secret of secrets) {
      itemsByType[secret.type].push(secret.path)
    }

    return {
      total: secrets.length,
      counts: tallyByType(secrets),
      itemsByType,
    }
  }
}

export function tallyByType(secrets: SecretSummary[]): TypeCounts {
  const counts = emptyTypeCounts()
  for (const secret of secrets) {
    counts[secret.type]++
  }
  return counts
}
