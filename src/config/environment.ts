/**
 * Environment Configuration with Validation
 *
 * Centralizes environment variable loading and provides fail-fast validation.
 * Use this instead of directly accessing process.env throughout the codebase.
 */

import { DEFAULT_GEMINI_MODEL } from '../ai/llm-factory'

export class ConfigurationError extends Error {
  public readonly details?: {
    missing?: string[]
    key?: string
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message)
    this.name = 'ConfigurationError'
    this.details = details
  }
}

export const DEFAULT_AKEYLESS_GATEWAY_URL = 'https://api.akeyless.io'

/**
 * Akeyless gateway credentials
 */
export interface AkeylessEnvironmentConfig {
  accessId: string
  accessKey: string
  gatewayUrl: string
}

export interface GeminiEnvironmentConfig {
  apiKey: string
  model: string
}

/**
 * Load Akeyless configuration from environment
 * @param required - If true, throws error if not configured
 */
export function loadAkeylessConfig(required: true, env?: NodeJS.ProcessEnv): AkeylessEnvironmentConfig
export function loadAkeylessConfig(required?: boolean, env?: NodeJS.ProcessEnv): AkeylessEnvironmentConfig | null
export function loadAkeylessConfig(
  required = false,
  env: NodeJS.ProcessEnv = process.env
): AkeylessEnvironmentConfig | null {
  const accessId = env.AKEYLESS_ACCESS_ID
  const accessKey = env.AKEYLESS_ACCESS_KEY

  if (!accessId || !accessKey) {
    if (required) {
      const missing = []
      if (!accessId) missing.push('AKEYLESS_ACCESS_ID')
      if (!accessKey) missing.push('AKEYLESS_ACCESS_KEY')
      throw new ConfigurationError(
        `Akeyless configuration required but missing: ${missing.join(', ')}`,
        { missing }
      )
    }
    return null
  }

  return {
    accessId,
    accessKey,
    gatewayUrl: (env.AKEYLESS_GATEWAY_URL || DEFAULT_AKEYLESS_GATEWAY_URL).replace(/\/+$/, ''),
  }
}

/**
 * Load Gemini configuration from environment
 * @param required - If true, throws error if not configured
 */
export function loadGeminiConfig(required: true, env?: NodeJS.ProcessEnv): GeminiEnvironmentConfig
export function loadGeminiConfig(required?: boolean, env?: NodeJS.ProcessEnv): GeminiEnvironmentConfig | null
export function loadGeminiConfig(
  required = false,
  env: NodeJS.ProcessEnv = process.env
): GeminiEnvironmentConfig | null {
  const apiKey = env.GEMINI_API_KEY

  if (!apiKey) {
    if (required) {
      throw new ConfigurationError(
        'Gemini configuration required but missing: GEMINI_API_KEY',
        { missing: ['GEMINI_API_KEY'] }
      )
    }
    return null
  }

  return {
    apiKey,
    model: env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL,
  }
}

/**
 * Startup check that reports every missing variable at once
 */
export function validateEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): void {
  const missing = ['AKEYLESS_ACCESS_ID', 'AKEYLESS_ACCESS_KEY', 'GEMINI_API_KEY'].filter(key => !env[key])

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Configuration validation failed:\n  - ${missing.map(key => `${key} is not set`).join('\n  - ')}`,
      { missing }
    )
  }
}
