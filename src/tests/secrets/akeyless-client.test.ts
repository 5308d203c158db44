import { describe, it, expect } from 'vitest'
import { AkeylessSecretsClient, toFolderPath, toItemName, toSecretValue } from '../../secrets/akeyless-client'
import { AccessDeniedError, GatewayRejectedError, NotFoundError, TimeoutError, UpstreamUnavailableError } from '../../errors'
import { createFakeFetch, jsonResponse } from '../utils/fakes'
import type { RouteHandler } from '../utils/fakes'

const GATEWAY = 'https://gateway.test'
const noRetry = { maxRetries: 0, initialDelayMs: 1, maxDelayMs: 1, backoffMultiplier: 1 }

function createClient(routes: Record<string, RouteHandler>, now: () => number = () => 0) {
  const fake = createFakeFetch(request => {
    const endpoint = request.url.slice(GATEWAY.length)
    const route = routes[endpoint]
    if (route) return route(request)
    if (endpoint === '/auth') return jsonResponse(200, { token: 't-1' })
    return jsonResponse(500, `no route for ${endpoint}`)
  })
  const client = new AkeylessSecretsClient({
    accessId: 'p-test',
    accessKey: 'test-secret',
    gatewayUrl: GATEWAY,
    timeoutMs: 1000,
    retryPolicy: noRetry,
    tokenTtlMs: 1000,
    fetchImpl: fake.fetch,
    now,
  })
  return { client, requests: fake.requests }
}

describe('path helpers', () => {
  it('should strip the leading slash from item names', () => {
    expect(toItemName('/secrets/MySecondSecret')).toBe('secrets/MySecondSecret')
    expect(toItemName('secrets/MySecondSecret')).toBe('secrets/MySecondSecret')
  })

  it('should normalise folder paths', () => {
    expect(toFolderPath('/prod/*')).toBe('/prod')
    expect(toFolderPath('prod/')).toBe('/prod')
    expect(toFolderPath('')).toBe('/')
    expect(toFolderPath('/')).toBe('/')
  })

  it('should promote JSON object strings to structured values', () => {
    expect(toSecretValue('/db', 'static', '{"username":"app","password":"test-secret"}')).toEqual({
      kind: 'structured',
      path: '/db',
      type: 'static',
      fields: { username: 'app', password: 'test-secret' },
    })
    expect(toSecretValue('/token', 'static', '[1,2]')).toEqual({
      kind: 'simple',
      path: '/token',
      type: 'static',
      value: '[1,2]',
    })
  })
})

describe('AkeylessSecretsClient', () => {
  it('should authenticate and list items with derived types', async () => {
    const { client, requests } = createClient({
      '/list-items': () => jsonResponse(200, {
        items: [
          { item_name: '/secrets/MySecondSecret', item_type: 'STATIC_SECRET', modification_date: '2024-05-01', item_tags: ['team-a'] },
          { item_name: '/db/rotating', item_type: 'ROTATED_SECRET' },
          { item_name: '/db/dynamic', item_type: 'DYNAMIC_SECRET' },
          { item_name: '/keys/aes', item_type: 'CLASSIC_KEY' },
        ],
      }),
    })

    const items = await client.listItems('/')

    expect(items).toEqual([
      { path: '/secrets/MySecondSecret', type: 'static', itemType: 'STATIC_SECRET', metadata: { lastModified: '2024-05-01', tags: ['team-a'] } },
      { path: '/db/rotating', type: 'rotated', itemType: 'ROTATED_SECRET' },
      { path: '/db/dynamic', type: 'dynamic', itemType: 'DYNAMIC_SECRET' },
      { path: '/keys/aes', type: 'other', itemType: 'CLASSIC_KEY' },
    ])
    expect(requests.map(r => r.url)).toEqual([`${GATEWAY}/auth`, `${GATEWAY}/list-items`])
    expect(requests[0].body).toEqual({ 'access-id': 'p-test', 'access-key': 'test-secret' })
    expect(requests[1].body).toEqual({ token: 't-1', path: '/' })
  })

  it('should treat an empty listing as no items', async () => {
    const { client } = createClient({ '/list-items': () => jsonResponse(200, {}) })

    await expect(client.listItems()).resolves.toEqual([])
  })

  it('should reuse the token until it expires', async () => {
    let clock = 0
    let tokens = 0
    const { client, requests } = createClient({
      '/auth': () => jsonResponse(200, { token: `t-${++tokens}` }),
      '/list-items': () => jsonResponse(200, { items: [] }),
    }, () => clock)

    await client.listItems()
    await client.listItems()
    clock = 5000
    await client.listItems()

    expect(requests.filter(r => r.url.endsWith('/auth'))).toHaveLength(2)
    expect(requests[requests.length - 1].body).toEqual({ token: 't-2', path: '/' })
  })

  it('should re-authenticate once when the token is rejected', async () => {
    let listCalls = 0
    let tokens = 0
    const { client, requests } = createClient({
      '/auth': () => jsonResponse(200, { token: `t-${++tokens}` }),
      '/list-items': () => (++listCalls === 1 ? jsonResponse(401, 'expired') : jsonResponse(200, { items: [] })),
    })

    await expect(client.listItems()).resolves.toEqual([])
    expect(requests.map(r => r.url.slice(GATEWAY.length))).toEqual(['/auth', '/list-items', '/auth', '/list-items'])
  })

  it('should map rejected credentials to AccessDeniedError', async () => {
    const { client } = createClient({ '/auth': () => jsonResponse(401, 'bad creds') })

    const error = await client.listItems().catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AccessDeniedError)
    expect(error).toHaveProperty('message', 'Akeyless rejected the access credentials')
  })

  it('should read a static value from the names map', async () => {
    const { client, requests } = createClient({
      '/get-secret-value': () => jsonResponse(200, { 'secrets/MySecondSecret': '{"username":"app","password":"test-secret"}' }),
    })

    const value = await client.getValue('/secrets/MySecondSecret', 'static')

    expect(value).toEqual({
      kind: 'structured',
      path: '/secrets/MySecondSecret',
      type: 'static',
      fields: { username: 'app', password: 'test-secret' },
    })
    expect(requests[1].body).toEqual({ token: 't-1', names: ['secrets/MySecondSecret'], json: false })
  })

  it('should use the rotated endpoint and unwrap its value', async () => {
    const { client, requests } = createClient({
      '/get-rotated-secret-value': () => jsonResponse(200, { value: { username: 'svc', password: 'test-secret' } }),
    })

    const value = await client.getValue('/db/rotating', 'rotated')

    expect(value).toEqual({ kind: 'structured', path: '/db/rotating', type: 'rotated', fields: { username: 'svc', password: 'test-secret' } })
    expect(requests[1].url).toBe(`${GATEWAY}/get-rotated-secret-value`)
  })

  it('should use the dynamic endpoint with a single name', async () => {
    const { client, requests } = createClient({
      '/get-dynamic-secret-value': () => jsonResponse(200, { user: 'tmp-user', ttl_in_minutes: 60 }),
    })

    const value = await client.getValue('/db/dynamic', 'dynamic')

    expect(value).toEqual({ kind: 'structured', path: '/db/dynamic', type: 'dynamic', fields: { user: 'tmp-user', ttl_in_minutes: 60 } })
    expect(requests[1].body).toEqual({ token: 't-1', name: 'db/dynamic' })
  })

  it('should raise NotFoundError for a missing item', async () => {
    const { client } = createClient({
      '/get-secret-value': () => jsonResponse(404, { error: 'Item not found' }),
      '/describe-item': () => jsonResponse(400, 'failed to get item: item does not exist'),
    })

    await expect(client.getValue('/nope', 'static')).rejects.toBeInstanceOf(NotFoundError)
    await expect(client.describeItem('/nope')).rejects.toBeInstanceOf(NotFoundError)
  })

  it('should raise NotFoundError when the answer lacks the requested name', async () => {
    const { client } = createClient({ '/get-secret-value': () => jsonResponse(200, { other: 'x' }) })

    await expect(client.getValue('/nope', 'static')).rejects.toBeInstanceOf(NotFoundError)
  })

  it('should map a 403 on an item to AccessDeniedError', async () => {
    const { client } = createClient({ '/get-secret-value': () => jsonResponse(403, 'forbidden') })

    const error = await client.getValue('/locked', 'static').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(AccessDeniedError)
    expect(error).toHaveProperty('message', 'Access denied to /locked')
  })

  it('should map gateway failures to UpstreamUnavailableError', async () => {
    const { client } = createClient({ '/list-items': () => jsonResponse(503, 'maintenance') })

    const error = await client.listItems().catch((e: unknown) => e)

    expect(error).toBeInstanceOf(UpstreamUnavailableError)
    expect(error).toHaveProperty('message', 'Akeyless gateway answered 503')
  })

  it('should report a 400 from the gateway as a rejected request', async () => {
    const { client } = createClient({ '/get-secret-value': () => jsonResponse(400, 'wrong item type') })

    const error = await client.getValue('/prod/rot', 'static').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(GatewayRejectedError)
    expect(error).toHaveProperty('kind', 'upstream_unavailable')
    expect(error).toHaveProperty('message', 'Akeyless gateway rejected the request with 400')
  })

  it('should surface timeouts as TimeoutError', async () => {
    const { client } = createClient({
      '/list-items': () => {
        throw new DOMException('timed out', 'TimeoutError')
      },
    })

    await expect(client.listItems()).rejects.toBeInstanceOf(TimeoutError)
  })

  it('should describe an item', async () => {
    const { client } = createClient({
      '/describe-item': () => jsonResponse(200, {
        item_name: '/db/rotating',
        item_type: 'ROTATED_SECRET',
        last_version: 3,
        item_metadata: 'billing database',
      }),
    })

    await expect(client.describeItem('/db/rotating')).resolves.toEqual({
      path: '/db/rotating',
      type: 'rotated',
      itemType: 'ROTATED_SECRET',
      lastVersion: 3,
      description: 'billing database',
    })
  })
})
