/**
 * API Integration Tests
 *
 * Full middleware and route stack over an in-memory secrets backend and a
 * canned model
 */

import { describe, it, expect, beforeEach } from 'vitest'
import 'express-async-errors'
import request from 'supertest'
import express, { Express } from 'express'
import { InMemorySecretsClient, Observability } from 'keyscout'
import type { ILLMProvider } from 'keyscout'
import { setupMiddleware } from '../src/middleware'
import { setupRoutes } from '../src/routes'
import { KeyscoutService } from '../src/services/keyscout-service'
import { loadConfig } from '../src/config'

const REPLIES: Record<string, string> = {
  'List all my secrets': '{"intent":"list_secrets"}',
  'How many secrets per type?': '{"intent":"count_by_type"}',
  'Get the secret /prod/db': '{"intent":"get_secret","params":{"path":"/prod/db"}}',
}

// Answers by the last user message; anything unscripted gets a non-JSON reply
const cannedModel: ILLMProvider = {
  async chat(messages) {
    const last = messages[messages.length - 1]
    return {
      content: REPLIES[last.content] ?? 'I am not sure.',
      usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
      model: 'canned',
    }
  }
}

const observability = new Observability({ level: 'silent' })

let client: InMemorySecretsClient

function createApp(env: NodeJS.ProcessEnv = {}): Express {
  const app = express()
  const config = loadConfig({ NODE_ENV: 'test', METRICS_ENABLED: 'false', LOG_LEVEL: 'silent', ...env })
  const service = new KeyscoutService(config, {}, { secretsClient: client, llm: cannedModel, observability })

  setupMiddleware(app, config)
  setupRoutes(app, service, config)
  return app
}

let app: Express

beforeEach(() => {
  client = new InMemorySecretsClient([
    { path: '/prod/db', type: 'static', value: 'test-secret' },
    { path: '/prod/api', type: 'static', value: '{"token":"test-token"}' },
    { path: '/prod/rot', type: 'rotated', value: { username: 'svc', password: 'test-secret' } },
    { path: '/keys/aes', type: 'other', value: 'test-key' },
  ])
  app = createApp()
})

describe('Health & Documentation', () => {
  it('GET /api/v1/health should return ok', async () => {
    const response = await request(app)
      .get('/api/v1/health')
      .expect(200)

    expect(response.body).toMatchObject({
      status: 'ok',
      version: '0.1.0',
      env: 'test'
    })
  })

  it('GET /docs should list the endpoints', async () => {
    const response = await request(app)
      .get('/docs')
      .expect(200)

    expect(Object.keys(response.body.endpoints)).toEqual([
      'health', 'chat', 'transcript', 'secrets', 'value', 'describe', 'counts', 'breakdown'
    ])
  })

  it('should answer unknown routes with 404', async () => {
    const response = await request(app).get('/api/v1/nothing').expect(404)
    expect(response.body).toEqual({ error: 'Not found', code: 'route_not_found', path: '/api/v1/nothing' })
  })
})

describe('Chat API', () => {
  it('POST /api/v1/chat should start a session and answer', async () => {
    const response = await request(app)
      .post('/api/v1/chat')
      .send({ message: 'List all my secrets' })
      .expect(200)

    expect(typeof response.body.sessionId).toBe('string')
    expect(response.body.turn.response).toBe(
      'You have 4 secrets:\n- /prod/db (static)\n- /prod/api (static)\n- /prod/rot (rotated)\n- /keys/aes (other)'
    )
    expect(response.body.turn.classified).toEqual({ intent: 'list_secrets', params: {} })
  })

  it('should keep turns of one session together', async () => {
    const first = await request(app).post('/api/v1/chat').send({ message: 'List all my secrets' }).expect(200)
    const { sessionId } = first.body

    await request(app).post('/api/v1/chat').send({ message: 'How many secrets per type?', sessionId }).expect(200)

    const transcript = await request(app).get(`/api/v1/chat/${sessionId}`).expect(200)
    expect(transcript.body.id).toBe(sessionId)
    expect(transcript.body.turns.map((t: { response: string }) => t.response)[1]).toBe(
      'You have 4 secrets: 2 static, 1 rotated, 0 dynamic, 1 other.'
    )
  })

  it('should reveal a value only for an explicit get request', async () => {
    const response = await request(app).post('/api/v1/chat').send({ message: 'Get the secret /prod/db' }).expect(200)

    expect(response.body.turn.response).toBe('Secret /prod/db (static):\n  value: test-secret')
  })

  it('should ask for clarification without touching the backend', async () => {
    const response = await request(app).post('/api/v1/chat').send({ message: 'Make me a sandwich' }).expect(200)

    expect(response.body.turn.classified.intent).toBe('unknown')
    expect(response.body.turn.response.split('\n')[0]).toBe("I'm not sure what you'd like me to do. You can ask me to:")
    expect(client.calls).toEqual({ listItems: 0, describeItem: 0, getValue: 0 })
  })

  it('should report a failed turn in the body, not as an HTTP error', async () => {
    client.setAvailable(false)

    const response = await request(app).post('/api/v1/chat').send({ message: 'List all my secrets' }).expect(200)

    expect(response.body.turn.error).toEqual({ kind: 'upstream_unavailable', message: 'Secrets backend is offline' })
    expect(response.body.turn.response).toBe('Sorry, the secrets service is unreachable right now. Please try again later.')
  })

  it('should reject an empty message', async () => {
    const response = await request(app).post('/api/v1/chat').send({ message: '   ' }).expect(400)
    expect(response.body).toEqual({ error: 'message: message is required', code: 'invalid_request' })
  })

  it('should reject a malformed JSON body', async () => {
    const response = await request(app)
      .post('/api/v1/chat')
      .set('Content-Type', 'application/json')
      .send('{"message":')
      .expect(400)

    expect(response.body).toEqual({ error: 'Malformed JSON body', code: 'invalid_request' })
  })

  it('DELETE /api/v1/chat/:sessionId should clear the transcript', async () => {
    const first = await request(app).post('/api/v1/chat').send({ message: 'List all my secrets' }).expect(200)
    const { sessionId } = first.body

    await request(app).delete(`/api/v1/chat/${sessionId}`).expect(204)

    const transcript = await request(app).get(`/api/v1/chat/${sessionId}`).expect(200)
    expect(transcript.body.turns).toEqual([])
  })

  it('should 404 for an unknown session', async () => {
    const response = await request(app).get('/api/v1/chat/no-such-session').expect(404)
    expect(response.body).toEqual({ error: 'Session not found: no-such-session', code: 'session_not_found' })
    await request(app).delete('/api/v1/chat/no-such-session').expect(404)
  })
})

describe('Secrets API', () => {
  it('GET /api/v1/secrets should filter by prefix and type', async () => {
    const response = await request(app).get('/api/v1/secrets?pathPrefix=/prod&type=static').expect(200)

    expect(response.body.total).toBe(2)
    expect(response.body.secrets.map((s: { path: string }) => s.path)).toEqual(['/prod/db', '/prod/api'])
  })

  it('should treat type=all as no filter', async () => {
    const response = await request(app).get('/api/v1/secrets?type=all').expect(200)
    expect(response.body.total).toBe(4)
  })

  it('should reject an unknown type filter', async () => {
    const response = await request(app).get('/api/v1/secrets?type=encrypted').expect(400)
    expect(response.body.code).toBe('invalid_request')
  })

  it('GET /api/v1/secrets/value should return the unmasked value', async () => {
    const response = await request(app).get('/api/v1/secrets/value').query({ path: '/prod/api' }).expect(200)

    expect(response.body.secret).toEqual({
      kind: 'structured',
      path: '/prod/api',
      type: 'static',
      fields: { token: 'test-token' },
    })
  })

  it('should map NotFound to 404', async () => {
    const response = await request(app).get('/api/v1/secrets/value').query({ path: '/nope' }).expect(404)
    expect(response.body).toEqual({ error: 'Secret not found: /nope', code: 'not_found' })
  })

  it('should map AccessDenied to 403', async () => {
    client.deny('/prod/db')
    const response = await request(app).get('/api/v1/secrets/value').query({ path: '/prod/db', type: 'static' }).expect(403)
    expect(response.body).toEqual({ error: 'Access denied by the secrets service', code: 'access_denied' })
  })

  it('should map an unavailable backend to 502', async () => {
    client.setAvailable(false)
    const response = await request(app).get('/api/v1/secrets').expect(502)
    expect(response.body).toEqual({ error: 'Secrets service unavailable', code: 'upstream_unavailable' })
  })

  it('should require a path for value retrieval', async () => {
    await request(app).get('/api/v1/secrets/value').expect(400)
  })

  it('GET /api/v1/secrets/describe should return metadata without a value', async () => {
    const response = await request(app).get('/api/v1/secrets/describe').query({ path: '/prod/rot' }).expect(200)

    expect(response.body.secret).toEqual({ path: '/prod/rot', type: 'rotated', itemType: 'ROTATED_SECRET', lastVersion: 1 })
    expect(client.calls.getValue).toBe(0)
  })
})

describe('Analytics API', () => {
  it('GET /api/v1/analytics/counts should zero-fill and summarise', async () => {
    const response = await request(app).get('/api/v1/analytics/counts').expect(200)

    expect(response.body).toEqual({
      static: 2,
      rotated: 1,
      dynamic: 0,
      other: 1,
      total: 4,
      summary: 'You have 4 secrets: 2 static, 1 rotated, 0 dynamic, 1 other.',
    })
  })

  it('GET /api/v1/analytics/breakdown should group paths by type', async () => {
    const response = await request(app).get('/api/v1/analytics/breakdown').expect(200)

    expect(response.body.itemsByType).toEqual({
      static: ['/prod/db', '/prod/api'],
      rotated: ['/prod/rot'],
      dynamic: [],
      other: ['/keys/aes'],
    })
  })
})

describe('API key', () => {
  it('should guard /api/ routes when API_KEY is set', async () => {
    const guarded = createApp({ API_KEY: 'test-secret' })

    await request(guarded).get('/api/v1/health').expect(200)
    await request(guarded).get('/api/v1/secrets').expect(401)
    await request(guarded).get('/api/v1/secrets').set('x-api-key', 'wrong').expect(401)
    await request(guarded).get('/api/v1/secrets').set('x-api-key', 'test-secret').expect(200)
  })
})
