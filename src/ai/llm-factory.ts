/**
 * LLM Factory - Configuration-driven provider initialization
 *
 * Plain objects, explicit wiring. Validates at startup, fails fast on
 * misconfiguration.
 */

import type { ILLMProvider, LLMConfig, LLMProvider as LLMProviderType } from './llm-provider'
import { GeminiProvider } from './providers/gemini'
import type { GeminiProviderOptions } from './providers/gemini'

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash'

/**
 * Environment-based configuration
 */
export interface LLMEnvironmentConfig {
  provider: LLMProviderType

  gemini?: {
    apiKey: string
    model: string
    temperature?: number
    maxTokens?: number
    timeoutMs?: number
  }
}

export class LLMConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LLMConfigurationError'
  }
}

function validateConfig(config: LLMEnvironmentConfig): void {
  const { provider } = config

  switch (provider) {
    case 'gemini':
      if (!config.gemini) {
        throw new LLMConfigurationError('Gemini provider selected but gemini configuration missing')
      }
      if (!config.gemini.apiKey) {
        throw new LLMConfigurationError('Gemini API key is required')
      }
      if (!config.gemini.model) {
        throw new LLMConfigurationError('Gemini model is required')
      }
      break

    default:
      throw new LLMConfigurationError(`Unknown provider: ${String(provider)}`)
  }
}

/**
 * Create LLM provider from environment configuration
 * Throws LLMConfigurationError if configuration is invalid
 */
export function createLLMProvider(
  config: LLMEnvironmentConfig,
  options: GeminiProviderOptions = {}
): ILLMProvider {
  validateConfig(config)

  const { gemini } = config
  if (config.provider !== 'gemini' || !gemini) {
    throw new LLMConfigurationError(`Unknown provider: ${String(config.provider)}`)
  }

  const providerConfig: LLMConfig = {
    provider: 'gemini',
    apiKey: gemini.apiKey,
    model: gemini.model,
    temperature: gemini.temperature,
    maxTokens: gemini.maxTokens,
    timeoutMs: gemini.timeoutMs,
  }
  return new GeminiProvider(providerConfig, options)
}

