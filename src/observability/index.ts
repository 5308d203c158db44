import pino from 'pino'
import type { Logger } from 'pino'

/**
 * Observability - structured logging and in-process counters
 *
 * - Structured JSON logging via Pino (pretty-printed in development)
 * - Child loggers carry the session id of the turn being handled
 * - Counters and timings for turns, intents and error kinds
 */

export type { Logger } from 'pino'

export interface Metrics {
  increment(name: string, value?: number, labels?: Record<string, string>): void
  timing(name: string, durationMs: number, labels?: Record<string, string>): void
}

export class InMemoryMetrics implements Metrics {
  private counters = new Map<string, number>()

  increment(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + value)
  }

  timing(name: string, durationMs: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels)
    this.counters.set(key, (this.counters.get(key) || 0) + durationMs)
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels) return name
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',')
    return `${name}{${labelStr}}`
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) || 0
  }
}

export interface ObservabilityOptions {
  level?: string
  pretty?: boolean
  /** File descriptor to write to; the CLI logs to stderr so stdout stays the conversation */
  destination?: number
}

export class Observability {
  public readonly logger: Logger
  public readonly metrics: InMemoryMetrics

  constructor(options: ObservabilityOptions = {}) {
    const level = options.level || process.env.LOG_LEVEL || 'info'

    if (options.pretty) {
      this.logger = pino({
        level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: options.destination ?? 1,
          },
        },
      })
    } else {
      this.logger = pino({ level }, pino.destination(options.destination ?? 1))
    }

    this.metrics = new InMemoryMetrics()
  }

  createChildLogger(context: Record<string, unknown>): Logger {
    return this.logger.child(context)
  }
}
