/**
 * LLM provider contract
 *
 * Minimal abstraction over a hosted model: one chat() call, text in,
 * text out. The classifier only ever needs a single completion per turn.
 */

/**
 * LLM provider types
 */
export type LLMProvider = 'gemini'

/**
 * Configuration for LLM provider
 */
export interface LLMConfig {
  provider: LLMProvider
  apiKey: string
  model: string
  endpoint?: string
  temperature?: number
  maxTokens?: number
  topP?: number
  /** Ask the model for a JSON document instead of free text */
  jsonMode?: boolean
  timeoutMs?: number
}

/**
 * Standard message format
 */
export interface LLMMessage {
  role: 'user' | 'assistant' | 'system'
  content: string
}

export interface TokenUsage {
  promptTokens: number
  completionTokens: number
  totalTokens: number
}

export interface LLMResponse {
  content: string
  usage: TokenUsage
  model: string
  finishReason?: string
}

/**
 * Provider interface - all providers implement this
 */
export interface ILLMProvider {
  chat(
    messages: LLMMessage[],
    options?: Partial<LLMConfig>
  ): Promise<LLMResponse>
}
