/**
 * Configuration Management
 */

import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

// z.coerce.boolean() would read 'false' as true
const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .transform(value => value === 'true' || value === '1')
    .default(fallback ? 'true' : 'false')

const ConfigSchema = z.object({
  env: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  port: z.coerce.number().default(8000),
  host: z.string().default('0.0.0.0'),

  /** When set, every /api/ route except health requires a matching x-api-key header */
  apiKey: z.string().min(1).optional(),

  rateLimit: z.object({
    windowMs: z.coerce.number().default(60000),
    maxRequests: z.coerce.number().default(300),
  }),

  sessions: z.object({
    ttlMs: z.coerce.number().int().positive().default(30 * 60 * 1000),
    maxSessions: z.coerce.number().int().positive().default(1000),
  }),

  metrics: z.object({
    enabled: flag(true),
    port: z.coerce.number().default(9090),
  }),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug', 'silent']).default('info'),
    format: z.enum(['json', 'text']).default('json'),
  }),

  cors: z.object({
    origin: z.string().default('*'),
    credentials: flag(false),
  }),
})

export type Config = z.infer<typeof ConfigSchema>

// `FOO=` in a .env file means unset
function setting(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value
}

/**
 * Load and validate configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    env: env.NODE_ENV || 'development',
    port: setting(env.PORT),
    host: setting(env.HOST),

    apiKey: env.API_KEY || undefined,

    rateLimit: {
      windowMs: setting(env.RATE_LIMIT_WINDOW_MS),
      maxRequests: setting(env.RATE_LIMIT_MAX_REQUESTS),
    },

    sessions: {
      ttlMs: setting(env.SESSION_TTL_MS),
      maxSessions: setting(env.MAX_SESSIONS),
    },

    metrics: {
      enabled: setting(env.METRICS_ENABLED),
      port: setting(env.METRICS_PORT),
    },

    logging: {
      level: setting(env.LOG_LEVEL),
      format: setting(env.LOG_FORMAT),
    },

    cors: {
      origin: setting(env.CORS_ORIGIN),
      credentials: setting(env.CORS_CREDENTIALS),
    },
  })
}

export const config: Config = loadConfig()
