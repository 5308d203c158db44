/**
 * In-Memory Secrets Client
 *
 * Simple in-memory implementation for testing and local development.
 * Mirrors the gateway's failure modes: unknown paths raise NotFoundError,
 * denied paths raise AccessDeniedError and an offline client raises
 * UpstreamUnavailableError.
 */

import type {
  SecretDescription,
  SecretMetadata,
  SecretsClient,
  SecretSummary,
  SecretType,
  SecretValue,
} from './types'
import { toSecretValue } from './akeyless-client'
import { AccessDeniedError, NotFoundError, UpstreamUnavailableError } from '../errors'

export interface InMemorySecret {
  path: string
  type: SecretType
  /** String values that hold a JSON object are returned as structured */
  value: string | Record<string, unknown>
  itemType?: string
  metadata?: SecretMetadata
  description?: string
}

const DEFAULT_ITEM_TYPES: Record<SecretType, string> = {
  static: 'STATIC_SECRET',
  rotated: 'ROTATED_SECRET',
  dynamic: 'DYNAMIC_SECRET',
  other: 'CLASSIC_KEY',
}

function normalizePath(path: string): string {
  return '/' + path.trim().replace(/^\/+/, '')
}

export class InMemorySecretsClient implements SecretsClient {
  private secrets = new Map<string, InMemorySecret>()
  private deniedPaths = new Set<string>()
  private available = true

  /** Number of calls made, by operation */
  public readonly calls = { listItems: 0, describeItem: 0, getValue: 0 }

  constructor(initialSecrets: InMemorySecret[] = []) {
    for (const secret of initialSecrets) {
      this.setSecret(secret)
    }
  }

  async listItems(path: string = '/'): Promise<SecretSummary[]> {
    this.calls.listItems++
    this.ensureAvailable()

    const folder = normalizePath(path).replace(/[/*]+$/, '')
    return Array.from(this.secrets.values())
      .filter(secret => folder === '' || secret.path === folder || secret.path.startsWith(`${folder}/`))
      .map(secret => this.toSummary(secret))
  }

  async describeItem(path: string): Promise<SecretDescription> {
    this.calls.describeItem++
    const secret = this.lookup(path)

    return {
      ...this.toSummary(secret),
      lastVersion: 1,
      description: secret.description,
    }
  }

  async getValue(path: string, type: SecretType): Promise<SecretValue> {
    this.calls.getValue++
    const secret = this.lookup(path)
    return toSecretValue(path, type, secret.value)
  }

  setSecret(secret: InMemorySecret): void {
    const path = normalizePath(secret.path)
    this.secrets.set(path, { ...secret, path })
  }

  deny(path: string): void {
    this.deniedPaths.add(normalizePath(path))
  }

  setAvailable(available: boolean): void {
    this.available = available
  }

  clear(): void {
    this.secrets.clear()
    this.deniedPaths.clear()
  }

  private lookup(path: string): InMemorySecret {
    this.ensureAvailable()

    const normalized = normalizePath(path)
    if (this.deniedPaths.has(normalized)) {
      throw new AccessDeniedError(`Access denied to ${path}`)
    }

    const secret = this.secrets.get(normalized)
    if (!secret) {
      throw new NotFoundError(path)
    }
    return secret
  }

  private ensureAvailable(): void {
    if (!this.available) {
      throw new UpstreamUnavailableError('Secrets backend is offline')
    }
  }

  private toSummary(secret: InMemorySecret): SecretSummary {
    const summary: SecretSummary = {
      path: secret.path,
      type: secret.type,
      itemType: secret.itemType ?? DEFAULT_ITEM_TYPES[secret.type],
    }
    if (secret.metadata) {
      summary.metadata = secret.metadata
    }
    return summary
  }
}
