import { describe, it, expect } from 'vitest'
import { loadConfig } from '../src/config'

describe('loadConfig', () => {
  it('should apply defaults for blank variables', () => {
    const config = loadConfig({ PORT: '', SESSION_TTL_MS: ' ', METRICS_ENABLED: '', LOG_LEVEL: '' })

    expect(config.port).toBe(8000)
    expect(config.sessions.ttlMs).toBe(30 * 60 * 1000)
    expect(config.metrics.enabled).toBe(true)
    expect(config.logging.level).toBe('info')
  })

  it('should read set variables', () => {
    const config = loadConfig({ PORT: '9000', METRICS_ENABLED: 'false', API_KEY: 'test-key' })

    expect(config.port).toBe(9000)
    expect(config.metrics.enabled).toBe(false)
    expect(config.apiKey).toBe('test-key')
  })
})
