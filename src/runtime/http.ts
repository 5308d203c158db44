/**
 * JSON-over-HTTP transport shared by the Gemini provider and the Akeyless client
 *
 * Every call carries an explicit timeout. Failures come out as one of four
 * shapes so each caller can map them onto its own error kinds:
 * - TimeoutError (already a user-facing kind)
 * - NetworkError (connection refused, DNS, reset)
 * - HttpStatusError (non-2xx answer, with the response body)
 * - MalformedResponseError (2xx answer that is not JSON)
 */

import { TimeoutError } from '../errors'
import { RetryHandler } from './retry-handler'
import type { RetryPolicy } from './retry-handler'
import type { Metrics } from '../observability'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly url: string
  ) {
    super(`HTTP ${status} from ${url}`)
    this.name = 'HttpStatusError'
  }
}

export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'NetworkError'
  }
}

/**
 * A 2xx answer whose body is not JSON
 */
export class MalformedResponseError extends Error {
  constructor(
    public readonly url: string,
    public readonly body: string,
    options?: { cause?: unknown }
  ) {
    super(`Malformed JSON from ${url}`, options)
    this.name = 'MalformedResponseError'
  }
}

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504])

export function isTransientHttpError(error: unknown): boolean {
  if (error instanceof TimeoutError || error instanceof NetworkError) {
    return true
  }
  return error instanceof HttpStatusError && RETRYABLE_STATUSES.has(error.status)
}

function isAbortTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  )
}

export interface JsonClientOptions {
  /** Name used in timeout messages and logs, e.g. 'Akeyless gateway' */
  service: string
  timeoutMs: number
  retryPolicy?: RetryPolicy
  fetchImpl?: FetchLike
  metrics?: Metrics
}

export class JsonClient {
  private readonly fetchImpl: FetchLike
  private readonly retry: RetryHandler

  constructor(private readonly options: JsonClientOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
    this.retry = new RetryHandler({
      policy: options.retryPolicy,
      isRetryable: isTransientHttpError,
      metrics: options.metrics,
      operation: options.service,
    })
  }

  /**
   * POST a JSON body and parse the JSON answer, retrying transient failures
   */
  async post(url: string, body: unknown, headers: Record<string, string> = {}): Promise<unknown> {
    return this.retry.withRetry(() => this.postOnce(url, body, headers))
  }

  private async postOnce(url: string, body: unknown, headers: Record<string, string>): Promise<unknown> {
    const { service, timeoutMs } = this.options

    let response: Response
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...headers,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      if (isAbortTimeout(error)) {
        throw new TimeoutError(service, timeoutMs, { cause: error })
      }
      const reason = error instanceof Error ? error.message : String(error)
      throw new NetworkError(`${service} unreachable: ${reason}`, { cause: error })
    }

    let text: string
    try {
      text = await response.text()
    } catch (error) {
      if (isAbortTimeout(error)) {
        throw new TimeoutError(service, timeoutMs, { cause: error })
      }
      throw new NetworkError(`${service} closed the connection`, { cause: error })
    }

    if (!response.ok) {
      throw new HttpStatusError(response.status, text, url)
    }

    if (text.trim() === '') {
      return null
    }

    try {
      return JSON.parse(text)
    } catch (error) {
      throw new MalformedResponseError(url, text, { cause: error })
    }
  }
}
