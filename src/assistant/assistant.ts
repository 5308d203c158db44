/**
 * Assistant - the per-turn pipeline
 *
 * classify → at most one façade call → format → append to the session.
 * handleTurn never throws; a failed turn is recorded with its error kind
 * and an apology as the response.
 */

import { randomUUID } from 'crypto'
import type { IntentClassifier } from '../intent/intent-classifier'
import type { ClassifiedIntent } from '../intent/types'
import type { FacadeResult, SecretOperations } from '../facade/secret-operations'
import { ResponseFormatter } from '../formatter/response-formatter'
import type { ChatSession, ChatTurn, TurnError } from '../session/chat-session'
import { isKeyscoutError, UnknownIntentError } from '../errors'
import type { Logger, Metrics } from '../observability'

export interface AssistantDependencies {
  classifier: Pick<IntentClassifier, 'classify'>
  operations: SecretOperations
  formatter?: ResponseFormatter
  logger?: Logger
  metrics?: Metrics
  now?: () => Date
}

export function toTurnError(error: unknown): TurnError {
  if (isKeyscoutError(error)) {
    return { kind: error.kind, message: error.message }
  }
  return { kind: 'internal', message: error instanceof Error ? error.message : String(error) }
}

export class Assistant {
  private readonly formatter: ResponseFormatter
  private readonly now: () => Date

  constructor(private readonly deps: AssistantDependencies) {
    this.formatter = deps.formatter ?? new ResponseFormatter()
    this.now = deps.now ?? (() => new Date())
  }

  /**
   * Run the façade operation for a classified intent
   */
  async dispatch(classified: ClassifiedIntent): Promise<FacadeResult> {
    const { operations } = this.deps
    const { params } = classified

    switch (classified.intent) {
      case 'list_secrets':
        return { operation: 'list_secrets', secrets: await operations.listSecrets() }

      case 'get_secret':
        if (!params.path) {
          throw new UnknownIntentError('get_secret needs a secret path')
        }
        // The model's type is a guess; the façade describes the item to pick the endpoint
        return { operation: 'get_secret_value', value: await operations.getSecretValue(params.path) }

      case 'count_by_type':
        return { operation: 'count_by_type', counts: await operations.countByType() }

      case 'search_secrets':
        return {
          operation: 'search_secrets',
          secrets: await operations.searchSecrets(params.pathPrefix, params.type),
          pathPrefix: params.pathPrefix,
          type: params.type,
        }

      case 'unknown':
        throw new UnknownIntentError('Request did not map to a supported operation')
    }
  }

  async handleTurn(session: ChatSession, text: string): Promise<ChatTurn> {
    const startTime = Date.now()
    const logger = this.deps.logger?.child({ sessionId: session.id })
    const turn: ChatTurn = {
      id: randomUUID(),
      userText: text,
      response: '',
      createdAt: this.now().toISOString(),
    }

    try {
      const classified: ClassifiedIntent = text.trim() === ''
        ? { intent: 'unknown', params: {} }
        : await this.deps.classifier.classify(text)
      turn.classified = classified

      if (classified.intent === 'unknown') {
        turn.response = this.formatter.clarification()
      } else {
        const result = await this.dispatch(classified)
        turn.result = result
        turn.response = this.formatter.format(classified, result)
      }
    } catch (error) {
      turn.error = toTurnError(error)
      turn.response = this.formatter.formatError(error)
      this.deps.metrics?.increment('turn_errors', 1, { kind: turn.error.kind })
      logger?.warn({ turnId: turn.id, kind: turn.error.kind, reason: turn.error.message }, 'Turn failed')
    }

    const intent = turn.classified?.intent ?? 'unclassified'
    const durationMs = Date.now() - startTime
    this.deps.metrics?.increment('turns', 1, { intent })
    this.deps.metrics?.timing('turn_duration_ms', durationMs, { intent })
    logger?.info({ turnId: turn.id, intent, durationMs, failed: turn.error !== undefined }, 'Turn handled')

    session.append(turn)
    return turn
  }
}
