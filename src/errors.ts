/**
 * Error kinds surfaced by a turn
 *
 * Every failure that can reach the user is a KeyscoutError with a `kind`
 * discriminant, so the formatter and the HTTP layer can map it without
 * inspecting messages.
 */

export type ErrorKind =
  | 'classification_failure'
  | 'unknown_intent'
  | 'not_found'
  | 'access_denied'
  | 'upstream_unavailable'
  | 'timeout'

export abstract class KeyscoutError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * The hosted LLM could not be reached, rejected the request, or answered
 * with something that is not a model reply at all
 */
export class ClassificationFailureError extends KeyscoutError {
  readonly kind = 'classification_failure' as const
}

/**
 * The utterance was classified, but into nothing the façade can serve
 */
export class UnknownIntentError extends KeyscoutError {
  readonly kind = 'unknown_intent' as const
}

export class NotFoundError extends KeyscoutError {
  readonly kind = 'not_found' as const

  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Secret not found: ${path}`, options)
  }
}

export class AccessDeniedError extends KeyscoutError {
  readonly kind = 'access_denied' as const
}

/**
 * The secret-management gateway was unreachable or answered 5xx
 */
export class UpstreamUnavailableError extends KeyscoutError {
  readonly kind = 'upstream_unavailable' as const
}

/**
 * The gateway was reached but refused the request as malformed or
 * unsupported (a 4xx other than auth and not-found)
 */
export class GatewayRejectedError extends UpstreamUnavailableError {
  constructor(public readonly status: number, options?: { cause?: unknown }) {
    super(`Akeyless gateway rejected the request with ${status}`, options)
  }
}

export class TimeoutError extends KeyscoutError {
  readonly kind = 'timeout' as const

  constructor(
    public readonly service: string,
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`${service} did not respond within ${timeoutMs}ms`, options)
  }
}

export function isKeyscoutError(error: unknown): error is KeyscoutError {
  return error instanceof KeyscoutError
}
