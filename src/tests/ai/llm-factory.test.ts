/**
 * Tests for LLM Factory - Configuration-driven provider initialization
 */

import { describe, it, expect } from 'vitest'
import {
  createLLMProvider,
  LLMConfigurationError,
} from '../../ai/llm-factory'
import type { LLMEnvironmentConfig } from '../../ai/llm-factory'
import { GeminiProvider } from '../../ai/providers/gemini'

describe('LLM Factory', () => {
  describe('createLLMProvider', () => {
    it('should create Gemini provider with valid config', () => {
      const config: LLMEnvironmentConfig = {
        provider: 'gemini',
        gemini: {
          apiKey: 'test-key',
          model: 'gemini-2.5-flash',
        },
      }

      const provider = createLLMProvider(config)
      expect(provider).toBeInstanceOf(GeminiProvider)
    })

    it('should throw when gemini config is missing', () => {
      const config: LLMEnvironmentConfig = { provider: 'gemini' }

      expect(() => createLLMProvider(config)).toThrow(LLMConfigurationError)
      expect(() => createLLMProvider(config)).toThrow('Gemini provider selected but gemini configuration missing')
    })

    it('should throw when the API key is empty', () => {
      const config: LLMEnvironmentConfig = {
        provider: 'gemini',
        gemini: { apiKey: '', model: 'gemini-2.5-flash' },
      }

      expect(() => createLLMProvider(config)).toThrow('Gemini API key is required')
    })
  })
})
