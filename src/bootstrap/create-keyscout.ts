/**
 * Wiring for the CLI and the API service
 *
 * Reads configuration once, fails fast on anything missing, and hands back
 * the assembled pipeline. Tests and embedders can swap the secrets client,
 * the LLM provider or the fetch implementation.
 */

import { createLLMProvider } from '../ai/llm-factory'
import type { ILLMProvider } from '../ai/llm-provider'
import { Assistant } from '../assistant/assistant'
import { loadAkeylessConfig, loadGeminiConfig } from '../config/environment'
import { loadRuntimeSettings } from '../config/schema'
import type { RuntimeSettings } from '../config/schema'
import { SecretOperations } from '../facade/secret-operations'
import { ResponseFormatter } from '../formatter/response-formatter'
import { IntentClassifier } from '../intent/intent-classifier'
import { Observability } from '../observability'
import type { Logger } from '../observability'
import type { FetchLike } from '../runtime/http'
import { AkeylessSecretsClient } from '../secrets/akeyless-client'
import type { SecretsClient } from '../secrets/types'
import { ChatSession } from '../session/chat-session'

export interface KeyscoutOverrides {
  secretsClient?: SecretsClient
  llm?: ILLMProvider
  fetchImpl?: FetchLike
  observability?: Observability
}

export interface Keyscout {
  settings: RuntimeSettings
  observability: Observability
  logger: Logger
  operations: SecretOperations
  classifier: IntentClassifier
  formatter: ResponseFormatter
  assistant: Assistant
  createSession(id?: string): ChatSession
}

export function createKeyscout(
  env: NodeJS.ProcessEnv = process.env,
  overrides: KeyscoutOverrides = {}
): Keyscout {
  const settings = loadRuntimeSettings(env)
  const observability = overrides.observability ?? new Observability({ level: settings.logLevel })
  const logger = observability.createChildLogger({ component: 'keyscout' })

  let secretsClient = overrides.secretsClient
  if (!secretsClient) {
    const akeyless = loadAkeylessConfig(true, env)
    secretsClient = new AkeylessSecretsClient({
      ...akeyless,
      timeoutMs: settings.httpTimeoutMs,
      retryPolicy: settings.retry,
      tokenTtlMs: settings.tokenTtlMs,
      fetchImpl: overrides.fetchImpl,
      logger,
    })
  }

  let llm = overrides.llm
  if (!llm) {
    const gemini = loadGeminiConfig(true, env)
    llm = createLLMProvider(
      {
        provider: 'gemini',
        gemini: {
          apiKey: gemini.apiKey,
          model: gemini.model,
          timeoutMs: settings.httpTimeoutMs,
        },
      },
      { fetchImpl: overrides.fetchImpl, retryPolicy: settings.retry }
    )
  }

  const operations = new SecretOperations(secretsClient)
  const classifier = new IntentClassifier(llm, { logger })
  const formatter = new ResponseFormatter()
  const assistant = new Assistant({
    classifier,
    operations,
    formatter,
    logger,
    metrics: observability.metrics,
  })

  return {
    settings,
    observability,
    logger,
    operations,
    classifier,
    formatter,
    assistant,
    createSession: id => new ChatSession({ id, maxTurns: settings.maxTurns }),
  }
}
