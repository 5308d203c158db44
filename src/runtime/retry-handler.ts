import type { Metrics } from '../observability'

/**
 * Configuration for retry behavior of outbound calls
 */
export interface RetryPolicy {
  maxRetries: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  initialDelayMs: 250,
  maxDelayMs: 2000,
  backoffMultiplier: 2,
}

export type RetryPredicate = (error: unknown) => boolean

export interface RetryHandlerOptions {
  policy?: RetryPolicy
  isRetryable?: RetryPredicate
  metrics?: Metrics
  /** Label recorded with retry metrics */
  operation?: string
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * RetryHandler - bounded retries with exponential backoff and jitter
 *
 * Only errors accepted by `isRetryable` are retried; everything else is
 * rethrown on the first attempt.
 */
export class RetryHandler {
  private readonly policy: RetryPolicy
  private readonly isRetryable: RetryPredicate
  private readonly sleep: (ms: number) => Promise<void>

  constructor(private readonly options: RetryHandlerOptions = {}) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY
    this.isRetryable = options.isRetryable ?? (() => true)
    this.sleep = options.sleep ?? defaultSleep
  }

  /**
   * Calculate delay for next retry using exponential backoff
   */
  calculateDelay(retryCount: number): number {
    const baseDelay = this.policy.initialDelayMs * Math.pow(this.policy.backoffMultiplier, retryCount)
    const cappedDelay = Math.min(baseDelay, this.policy.maxDelayMs)

    // ±25% jitter
    const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1)

    return Math.max(0, Math.floor(cappedDelay + jitter))
  }

  async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    const labels = this.options.operation ? { operation: this.options.operation } : undefined

    for (let attempt = 0; ; attempt++) {
      try {
        if (attempt > 0) {
          this.options.metrics?.increment('retry_attempt', 1, labels)
        }
        return await operation()
      } catch (error) {
        if (attempt >= this.policy.maxRetries || !this.isRetryable(error)) {
          if (attempt > 0) {
            this.options.metrics?.increment('retry_exhausted', 1, labels)
          }
          throw error
        }

        await this.sleep(this.calculateDelay(attempt))
      }
    }
  }
}
