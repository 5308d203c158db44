/**
 * Zod schema for keyscout runtime tunables
 */

import { z } from 'zod'
import { ConfigurationError } from './environment'

export const RetryPolicySchema = z.object({
  maxRetries: z.coerce.number().int().min(0).max(10).default(2),
  initialDelayMs: z.coerce.number().int().positive().default(250),
  maxDelayMs: z.coerce.number().int().positive().default(2000),
  backoffMultiplier: z.coerce.number().positive().default(2),
})

export const RuntimeSettingsSchema = z.object({
  /** Per-call timeout for both the LLM and the secret-management gateway */
  httpTimeoutMs: z.coerce.number().int().positive().default(15000),
  retry: RetryPolicySchema.default({}),
  /** Oldest turns are dropped from a session transcript beyond this */
  maxTurns: z.coerce.number().int().positive().default(100),
  /** Cached gateway token lifetime */
  tokenTtlMs: z.coerce.number().int().positive().default(10 * 60 * 1000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export type RuntimeSettings = z.infer<typeof RuntimeSettingsSchema>

const ENV_KEYS: Record<string, string> = {
  httpTimeoutMs: 'KEYSCOUT_HTTP_TIMEOUT_MS',
  'retry.maxRetries': 'KEYSCOUT_MAX_RETRIES',
  maxTurns: 'KEYSCOUT_MAX_TURNS',
  tokenTtlMs: 'KEYSCOUT_TOKEN_TTL_MS',
  logLevel: 'LOG_LEVEL',
}

// `FOO=` in a .env file means unset
function setting(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}

/**
 * Read tunables from the environment; unset variables fall back to defaults
 */
export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  const parsed = RuntimeSettingsSchema.safeParse({
    httpTimeoutMs: setting(env.KEYSCOUT_HTTP_TIMEOUT_MS),
    retry: {
      maxRetries: setting(env.KEYSCOUT_MAX_RETRIES),
    },
    maxTurns: setting(env.KEYSCOUT_MAX_TURNS),
    tokenTtlMs: setting(env.KEYSCOUT_TOKEN_TTL_MS),
    logLevel: setting(env.LOG_LEVEL),
  })

  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue.path.join('.')
    const key = ENV_KEYS[field] ?? field
    throw new ConfigurationError(`Invalid value for ${key}: ${issue.message}`, { key })
  }
  return parsed.data
}
