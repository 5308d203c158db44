import { describe, it, expect } from 'vitest'
import { createKeyscout } from '../../bootstrap/create-keyscout'
import { ConfigurationError } from '../../config/environment'
import { Observability } from '../../observability'
import { InMemorySecretsClient } from '../../secrets/in-memory-secrets'
import { createFakeFetch, jsonResponse } from '../utils/fakes'

const observability = new Observability({ level: 'silent' })

describe('createKeyscout', () => {
  it('should fail fast when credentials are missing', () => {
    expect(() => createKeyscout({}, { observability })).toThrow(ConfigurationError)
  })

  it('should wire the Akeyless client and Gemini provider from the environment', async () => {
    const { fetch, requests } = createFakeFetch(request => {
      if (request.url.endsWith(':generateContent')) {
        return jsonResponse(200, { candidates: [{ content: { parts: [{ text: '{"intent":"count_by_type"}' }] } }] })
      }
      if (request.url.endsWith('/auth')) return jsonResponse(200, { token: 't-1' })
      return jsonResponse(200, { items: [{ item_name: '/a', item_type: 'STATIC_SECRET' }] })
    })

    const keyscout = createKeyscout(
      {
        AKEYLESS_ACCESS_ID: 'p-test',
        AKEYLESS_ACCESS_KEY: 'test-secret',
        AKEYLESS_GATEWAY_URL: 'https://gateway.test/',
        GEMINI_API_KEY: 'test-key',
        KEYSCOUT_MAX_TURNS: '5',
      },
      { fetchImpl: fetch, observability }
    )
    const session = keyscout.createSession('cli')
    const turn = await keyscout.assistant.handleTurn(session, 'How many secrets?')

    expect(turn.response).toBe('You have 1 secret: 1 static, 0 rotated, 0 dynamic, 0 other.')
    expect(requests.map(r => r.url)).toEqual([
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent',
      'https://gateway.test/auth',
      'https://gateway.test/list-items',
    ])
    expect(keyscout.settings.maxTurns).toBe(5)
    expect(keyscout.observability.metrics.getCounter('turns', { intent: 'count_by_type' })).toBe(1)
  })

  it('should accept a ready-made secrets client and model', async () => {
    const keyscout = createKeyscout({}, {
      observability,
      secretsClient: new InMemorySecretsClient(),
      llm: { chat: async () => ({ content: '{"intent":"list_secrets"}', usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 }, model: 'm' }) },
    })

    const turn = await keyscout.assistant.handleTurn(keyscout.createSession(), 'List all my secrets')
    expect(turn.response).toBe('No secrets found.')
  })
})
