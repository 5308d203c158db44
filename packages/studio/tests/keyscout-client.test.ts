import { describe, it, expect, vi } from 'vitest';
import { KeyscoutApiError, KeyscoutClient } from '../src/lib/keyscout-client';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createClient(response: Response, apiKey?: string) {
  const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) => response);
  const client = new KeyscoutClient({ baseUrl: 'http://api.test/', apiKey, fetchImpl });
  return { client, fetchImpl };
}

describe('KeyscoutClient', () => {
  it('posts chat messages with the session id', async () => {
    const { client, fetchImpl } = createClient(
      jsonResponse(200, { sessionId: 's-1', turn: { id: 't-1', userText: 'hi', response: 'hello', createdAt: '2024-01-01T00:00:00.000Z' } })
    );

    const result = await client.chat('hi', 's-1');

    expect(result.sessionId).toBe('s-1');
    expect(result.turn.response).toBe('hello');
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('http://api.test/api/v1/chat');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ message: 'hi', sessionId: 's-1' }));
  });

  it('omits the session id when there is none yet', async () => {
    const { client, fetchImpl } = createClient(jsonResponse(200, { sessionId: 's-2', turn: {} }));

    await client.chat('hi', null);

    expect(fetchImpl.mock.calls[0][1]?.body).toBe(JSON.stringify({ message: 'hi' }));
  });

  it('builds the list query and drops the all filter', async () => {
    const { client, fetchImpl } = createClient(jsonResponse(200, { secrets: [], total: 0 }));

    await client.listSecrets({ pathPrefix: '/prod', type: 'all' });

    expect(fetchImpl.mock.calls[0][0]).toBe('http://api.test/api/v1/secrets?pathPrefix=%2Fprod');
  });

  it('passes the type hint when reading a value', async () => {
    const { client, fetchImpl } = createClient(
      jsonResponse(200, { secret: { kind: 'simple', path: '/prod/db', type: 'static', value: 'test-secret' } })
    );

    const { secret } = await client.getSecretValue('/prod/db', 'static');

    expect(secret).toEqual({ kind: 'simple', path: '/prod/db', type: 'static', value: 'test-secret' });
    expect(fetchImpl.mock.calls[0][0]).toBe('http://api.test/api/v1/secrets/value?path=%2Fprod%2Fdb&type=static');
  });

  it('sends the api key header when configured', async () => {
    const { client, fetchImpl } = createClient(jsonResponse(200, { static: 0, rotated: 0, dynamic: 0, other: 0, total: 0, summary: '' }), 'test-key');

    await client.getCounts();

    const headers = fetchImpl.mock.calls[0][1]?.headers;
    expect(headers).toEqual({ Accept: 'application/json', 'x-api-key': 'test-key' });
  });

  it('resolves on 204 without reading a body', async () => {
    const { client, fetchImpl } = createClient(new Response(null, { status: 204 }));

    await expect(client.clearSession('s-1')).resolves.toBeUndefined();
    expect(fetchImpl.mock.calls[0][1]?.method).toBe('DELETE');
  });

  it('raises the API error body as KeyscoutApiError', async () => {
    const { client } = createClient(jsonResponse(404, { error: 'No secret exists at /missing', code: 'not_found' }));

    const error = await client.describeSecret('/missing').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(KeyscoutApiError);
    expect(error).toMatchObject({ status: 404, code: 'not_found', message: 'No secret exists at /missing' });
  });

  it('falls back to a generic error when the body is not JSON', async () => {
    const { client } = createClient(new Response('gateway down', { status: 502 }));

    await expect(client.getBreakdown()).rejects.toMatchObject({
      status: 502,
      code: 'http_error',
      message: 'Request failed with status 502',
    });
  });
});
