/**
 * Keyscout Service - Core integration layer
 *
 * Owns the assembled pipeline and the per-conversation sessions. Routers
 * call into this; nothing else touches the core directly.
 */

import { createKeyscout } from 'keyscout'
import type {
  ChatSessionSnapshot,
  ChatTurn,
  Keyscout,
  KeyscoutOverrides,
  SecretDescription,
  SecretSummary,
  SecretType,
  SecretValue,
  TypeBreakdown,
  TypeCounts,
} from 'keyscout'
import { formatCountSummary } from 'keyscout'
import type { Config } from '../config'
import { logger } from '../utils/logger'
import { chatTurnsTotal, secretOperationsTotal } from '../observability/metrics'
import { SessionService } from './session-service'

export class KeyscoutService {
  public readonly keyscout: Keyscout
  public readonly sessions: SessionService

  constructor(
    config: Config,
    env: NodeJS.ProcessEnv = process.env,
    overrides: KeyscoutOverrides = {}
  ) {
    this.keyscout = createKeyscout(env, overrides)
    this.sessions = new SessionService({
      ttlMs: config.sessions.ttlMs,
      maxSessions: config.sessions.maxSessions,
      maxTurns: this.keyscout.settings.maxTurns,
    })
    logger.info('Keyscout service initialized', {
      maxTurns: this.keyscout.settings.maxTurns,
      httpTimeoutMs: this.keyscout.settings.httpTimeoutMs,
    })
  }

  async chat(message: string, sessionId?: string): Promise<{ sessionId: string; turn: ChatTurn }> {
    const session = this.sessions.getOrCreate(sessionId)
    const turn = await this.keyscout.assistant.handleTurn(session, message)

    chatTurnsTotal.inc({
      intent: turn.classified?.intent ?? 'unclassified',
      outcome: turn.error ? turn.error.kind : 'ok',
    })
    return { sessionId: session.id, turn }
  }

  getTranscript(sessionId: string): ChatSessionSnapshot | undefined {
    return this.sessions.get(sessionId)?.toJSON()
  }

  clearTranscript(sessionId: string): boolean {
    const session = this.sessions.get(sessionId)
    if (!session) return false
    session.clear()
    return true
  }

  async searchSecrets(pathPrefix?: string, type?: SecretType): Promise<SecretSummary[]> {
    return this.track('search_secrets', () => this.keyscout.operations.searchSecrets(pathPrefix, type))
  }

  /**
   * Explicit retrieval from the secret browser; returned unmasked
   */
  async getSecretValue(path: string, type?: SecretType): Promise<SecretValue> {
    const value = await this.track('get_secret_value', () => this.keyscout.operations.getSecretValue(path, type))
    logger.info('Secret value retrieved', { path, type: value.type })
    return value
  }

  async describeSecret(path: string): Promise<SecretDescription> {
    return this.track('describe_secret', () => this.keyscout.operations.describeSecret(path))
  }

  async countByType(): Promise<TypeCounts & { total: number; summary: string }> {
    const counts = await this.track('count_by_type', () => this.keyscout.operations.countByType())
    return {
      ...counts,
      total: counts.static + counts.rotated + counts.dynamic + counts.other,
      summary: formatCountSummary(counts),
    }
  }

  async breakdownByType(): Promise<TypeBreakdown> {
    return this.track('breakdown_by_type', () => this.keyscout.operations.breakdownByType())
  }

  private async track<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      const result = await run()
      secretOperationsTotal.inc({ operation, status: 'ok' })
      return result
    } catch (error) {
      secretOperationsTotal.inc({ operation, status: 'error' })
      throw error
    }
  }
}
