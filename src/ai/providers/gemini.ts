/**
 * Google Gemini Provider
 * Thin wrapper around the generateContent REST endpoint
 */

import { z } from 'zod'
import type { ILLMProvider, LLMConfig, LLMMessage, LLMResponse } from '../llm-provider'
import { ClassificationFailureError, TimeoutError } from '../../errors'
import { HttpStatusError, JsonClient, MalformedResponseError, NetworkError } from '../../runtime/http'
import type { FetchLike } from '../../runtime/http'
import type { RetryPolicy } from '../../runtime/retry-handler'

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta'
const DEFAULT_TIMEOUT_MS = 15000

const GenerateContentResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
    finishReason: z.string().optional(),
  })).min(1),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
    totalTokenCount: z.number().optional(),
  }).optional(),
})

export interface GeminiProviderOptions {
  fetchImpl?: FetchLike
  retryPolicy?: RetryPolicy
}

export class GeminiProvider implements ILLMProvider {
  private config: LLMConfig
  private baseUrl: string
  private http: JsonClient

  constructor(config: LLMConfig, options: GeminiProviderOptions = {}) {
    this.config = config
    this.baseUrl = config.endpoint ?? GEMINI_BASE_URL
    this.http = new JsonClient({
      service: 'Gemini API',
      timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      retryPolicy: options.retryPolicy,
      fetchImpl: options.fetchImpl,
    })
  }

  async chat(
    messages: LLMMessage[],
    options?: Partial<LLMConfig>
  ): Promise<LLMResponse> {
    const mergedConfig = { ...this.config, ...options }

    // Gemini format: separate system instruction from conversation
    const systemMessage = messages.find(m => m.role === 'system')
    const conversationMessages = messages.filter(m => m.role !== 'system')

    const url = `${this.baseUrl}/models/${mergedConfig.model}:generateContent`

    let raw: unknown
    try {
      raw = await this.http.post(url, {
        contents: conversationMessages.map(m => ({
          role: m.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: m.content }],
        })),
        systemInstruction: systemMessage ? {
          parts: [{ text: systemMessage.content }],
        } : undefined,
        generationConfig: {
          temperature: mergedConfig.temperature ?? 0.7,
          maxOutputTokens: mergedConfig.maxTokens,
          topP: mergedConfig.topP,
          responseMimeType: mergedConfig.jsonMode ? 'application/json' : undefined,
        },
      }, {
        'x-goog-api-key': mergedConfig.apiKey,
      })
    } catch (error) {
      throw toClassificationError(error)
    }

    const parsed = GenerateContentResponseSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ClassificationFailureError('Gemini API returned an unexpected response shape')
    }

    const [candidate] = parsed.data.candidates
    const usage = parsed.data.usageMetadata

    return {
      content: (candidate.content?.parts ?? []).map(part => part.text ?? '').join(''),
      usage: {
        promptTokens: usage?.promptTokenCount ?? 0,
        completionTokens: usage?.candidatesTokenCount ?? 0,
        totalTokens: usage?.totalTokenCount ?? 0,
      },
      model: mergedConfig.model,
      finishReason: candidate.finishReason,
    }
  }
}

function toClassificationError(error: unknown): Error {
  if (error instanceof TimeoutError) {
    return error
  }
  if (error instanceof HttpStatusError) {
    const reason =
      error.status === 401 || error.status === 403 ? 'rejected the API key' :
      error.status === 429 ? 'rate limit exceeded' :
      `answered ${error.status}`
    return new ClassificationFailureError(`Gemini API ${reason}`, { cause: error })
  }
  if (error instanceof NetworkError || error instanceof MalformedResponseError) {
    return new ClassificationFailureError(error.message, { cause: error })
  }
  return new ClassificationFailureError('Gemini API call failed', { cause: error })
}
