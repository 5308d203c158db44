/**
 * Akeyless Secrets Client
 *
 * Read-only client for the Akeyless gateway REST API. Authenticates with an
 * access-id/access-key pair, caches the session token for a bounded
 * lifetime and re-authenticates once when the gateway answers 401.
 */

import { z } from 'zod'
import type {
  SecretDescription,
  SecretsClient,
  SecretSummary,
  SecretType,
  SecretValue,
} from './types'
import { classifyItemType } from './types'
import {
  AccessDeniedError,
  GatewayRejectedError,
  NotFoundError,
  TimeoutError,
  UpstreamUnavailableError,
} from '../errors'
import { HttpStatusError, JsonClient, MalformedResponseError, NetworkError } from '../runtime/http'
import type { FetchLike } from '../runtime/http'
import type { RetryPolicy } from '../runtime/retry-handler'
import type { Logger } from '../observability'

export interface AkeylessClientConfig {
  accessId: string
  accessKey: string
  gatewayUrl: string
  timeoutMs?: number
  retryPolicy?: RetryPolicy
  tokenTtlMs?: number
  fetchImpl?: FetchLike
  logger?: Logger
  now?: () => number
}

const AuthResponseSchema = z.object({ token: z.string().min(1) })

const ItemSchema = z.object({
  item_name: z.string(),
  item_type: z.string().default('UNKNOWN'),
  item_tags: z.array(z.string()).nullish(),
  modification_date: z.string().nullish(),
  last_version: z.number().nullish(),
  item_metadata: z.string().nullish(),
})

const ListItemsResponseSchema = z.object({
  items: z.array(ItemSchema).nullish(),
})

const ValueResponseSchema = z.record(z.unknown())

type AkeylessItem = z.infer<typeof ItemSchema>

const NOT_FOUND_PATTERN = /not\s*found|does not exist|no such item/i

/**
 * Names are sent without the leading slash, as the gateway expects
 */
export function toItemName(path: string): string {
  return path.trim().replace(/^\/+/, '')
}

/**
 * Folder path for list-items: `/prod/*` and `/prod/` both become `/prod`
 */
export function toFolderPath(path: string): string {
  const trimmed = path.trim().replace(/[/*]+$/, '')
  if (!trimmed) return '/'
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`
}

function toSummary(item: AkeylessItem): SecretSummary {
  const summary: SecretSummary = {
    path: item.item_name,
    type: classifyItemType(item.item_type),
    itemType: item.item_type,
  }

  const lastModified = item.modification_date ?? undefined
  const tags = item.item_tags ?? undefined
  if (lastModified || (tags && tags.length > 0)) {
    summary.metadata = { lastModified, tags }
  }

  return summary
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text)
    return isPlainObject(parsed) ? parsed : null
  } catch {
    return null
  }
}

/**
 * Promote JSON-object strings to structured values
 */
export function toSecretValue(path: string, type: SecretType, raw: unknown): SecretValue {
  if (typeof raw === 'string') {
    const parsed = parseJsonObject(raw)
    if (parsed) {
      return { kind: 'structured', path, type, fields: parsed }
    }
    return { kind: 'simple', path, type, value: raw }
  }

  if (isPlainObject(raw)) {
    return { kind: 'structured', path, type, fields: raw }
  }

  return { kind: 'simple', path, type, value: raw === undefined || raw === null ? '' : String(raw) }
}

export class AkeylessSecretsClient implements SecretsClient {
  private readonly http: JsonClient
  private readonly tokenTtlMs: number
  private readonly now: () => number
  private token: { value: string; expiresAt: number } | null = null

  constructor(private readonly config: AkeylessClientConfig) {
    this.http = new JsonClient({
      service: 'Akeyless gateway',
      timeoutMs: config.timeoutMs ?? 15000,
      retryPolicy: config.retryPolicy,
      fetchImpl: config.fetchImpl,
    })
    this.tokenTtlMs = config.tokenTtlMs ?? 10 * 60 * 1000
    this.now = config.now ?? Date.now
  }

  async listItems(path: string = '/'): Promise<SecretSummary[]> {
    const folder = toFolderPath(path)
    const raw = await this.call('/list-items', token => ({ token, path: folder }), folder)
    const parsed = ListItemsResponseSchema.safeParse(raw ?? {})
    if (!parsed.success) {
      throw new UpstreamUnavailableError('Akeyless gateway returned an unexpected item listing')
    }

    return (parsed.data.items ?? []).map(toSummary)
  }

  async describeItem(path: string): Promise<SecretDescription> {
    const name = toItemName(path)
    const raw = await this.call('/describe-item', token => ({ token, name }), path)
    if (raw === null) {
      throw new NotFoundError(path)
    }

    const parsed = ItemSchema.safeParse(raw)
    if (!parsed.success) {
      throw new UpstreamUnavailableError('Akeyless gateway returned an unexpected item description')
    }

    const item = parsed.data
    return {
      ...toSummary(item),
      lastVersion: item.last_version ?? undefined,
      description: item.item_metadata || undefined,
    }
  }

  async getValue(path: string, type: SecretType): Promise<SecretValue> {
    const name = toItemName(path)

    if (type === 'dynamic') {
      const raw = await this.call('/get-dynamic-secret-value', token => ({ token, name }), path)
      if (raw === null) {
        throw new NotFoundError(path)
      }
      return toSecretValue(path, type, raw)
    }

    const endpoint = type === 'rotated' ? '/get-rotated-secret-value' : '/get-secret-value'
    const raw = await this.call(endpoint, token => ({ token, names: [name], json: false }), path)
    const parsed = ValueResponseSchema.safeParse(raw)
    if (!parsed.success) {
      throw new NotFoundError(path)
    }

    const result = parsed.data
    const candidates = [name, `/${name}`, path]
    const key = candidates.find(candidate => candidate in result)
    if (key !== undefined) {
      return toSecretValue(path, type, result[key])
    }

    // Rotated secrets answer { value: { username, password, ... } }
    if ('value' in result) {
      return toSecretValue(path, type, result.value)
    }

    throw new NotFoundError(path)
  }

  private async getToken(): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) {
      return this.token.value
    }

    let raw: unknown
    try {
      raw = await this.http.post(`${this.config.gatewayUrl}/auth`, {
        'access-id': this.config.accessId,
        'access-key': this.config.accessKey,
      })
    } catch (error) {
      if (error instanceof HttpStatusError && (error.status === 401 || error.status === 403)) {
        throw new AccessDeniedError('Akeyless rejected the access credentials', { cause: error })
      }
      throw this.mapError(error)
    }

    const parsed = AuthResponseSchema.safeParse(raw)
    if (!parsed.success) {
      throw new UpstreamUnavailableError('Akeyless gateway returned no token')
    }

    this.token = { value: parsed.data.token, expiresAt: this.now() + this.tokenTtlMs }
    this.config.logger?.debug({ gatewayUrl: this.config.gatewayUrl }, 'Akeyless token refreshed')
    return this.token.value
  }

  /**
   * Authenticated call; a 401 drops the cached token and retries once
   */
  private async call(
    endpoint: string,
    payload: (token: string) => Record<string, unknown>,
    path?: string
  ): Promise<unknown> {
    const url = `${this.config.gatewayUrl}${endpoint}`

    for (let attempt = 0; ; attempt++) {
      const token = await this.getToken()
      try {
        return await this.http.post(url, payload(token))
      } catch (error) {
        if (error instanceof HttpStatusError && error.status === 401 && attempt === 0) {
          this.token = null
          continue
        }
        throw this.mapError(error, path)
      }
    }
  }

  private mapError(error: unknown, path?: string): Error {
    if (error instanceof TimeoutError) {
      return error
    }

    if (error instanceof HttpStatusError) {
      if (path !== undefined && (error.status === 404 || NOT_FOUND_PATTERN.test(error.body))) {
        return new NotFoundError(path, { cause: error })
      }
      if (error.status === 401 || error.status === 403) {
        return new AccessDeniedError(
          path ? `Access denied to ${path}` : 'Access denied by Akeyless gateway',
          { cause: error }
        )
      }
      if (error.status >= 400 && error.status < 500) {
        return new GatewayRejectedError(error.status, { cause: error })
      }
      return new UpstreamUnavailableError(`Akeyless gateway answered ${error.status}`, { cause: error })
    }

    if (error instanceof NetworkError || error instanceof MalformedResponseError) {
      return new UpstreamUnavailableError(error.message, { cause: error })
    }

    return new UpstreamUnavailableError('Akeyless gateway call failed', { cause: error })
  }
}
