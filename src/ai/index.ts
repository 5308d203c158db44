/**
 * LLM integration - provider contract, Gemini provider and factory
 */

export type {
  ILLMProvider,
  LLMConfig,
  LLMMessage,
  LLMProvider,
  LLMResponse,
  TokenUsage,
} from './llm-provider'

export { GeminiProvider, GEMINI_BASE_URL } from './providers/gemini'
export type { GeminiProviderOptions } from './providers/gemini'

export {
  createLLMProvider,
  LLMConfigurationError,
  DEFAULT_GEMINI_MODEL,
} from './llm-factory'
export type { LLMEnvironmentConfig } from './llm-factory'
