import { describe, it, expect } from 'vitest'
import { GeminiProvider, GEMINI_BASE_URL } from '../../ai/providers/gemini'
import { ClassificationFailureError, TimeoutError } from '../../errors'
import { createFakeFetch, jsonResponse } from '../utils/fakes'

const noRetry = { maxRetries: 0, initialDelayMs: 1, maxDelayMs: 1, backoffMultiplier: 1 }

function createProvider(fetchImpl: Parameters<typeof createFakeFetch>[0]) {
  const fake = createFakeFetch(fetchImpl)
  const provider = new GeminiProvider(
    { provider: 'gemini', apiKey: 'test-key', model: 'gemini-test', timeoutMs: 1000 },
    { fetchImpl: fake.fetch, retryPolicy: noRetry }
  )
  return { provider, requests: fake.requests }
}

describe('GeminiProvider', () => {
  it('should send system instruction, contents and JSON mode', async () => {
    const { provider, requests } = createProvider(() => jsonResponse(200, {
      candidates: [{ content: { parts: [{ text: '{"intent":' }, { text: '"list_secrets"}' }] }, finishReason: 'STOP' }],
      usageMetadata: { promptTokenCount: 12, candidatesTokenCount: 5, totalTokenCount: 17 },
    }))

    const response = await provider.chat(
      [
        { role: 'system', content: 'route requests' },
        { role: 'user', content: 'List all my secrets' },
        { role: 'assistant', content: '{}' },
      ],
      { temperature: 0, jsonMode: true }
    )

    expect(response.content).toBe('{"intent":"list_secrets"}')
    expect(response.usage).toEqual({ promptTokens: 12, completionTokens: 5, totalTokens: 17 })
    expect(response.finishReason).toBe('STOP')

    const [request] = requests
    expect(request.url).toBe(`${GEMINI_BASE_URL}/models/gemini-test:generateContent`)
    expect(request.headers['x-goog-api-key']).toBe('test-key')
    expect(request.body).toEqual({
      contents: [
        { role: 'user', parts: [{ text: 'List all my secrets' }] },
        { role: 'model', parts: [{ text: '{}' }] },
      ],
      systemInstruction: { parts: [{ text: 'route requests' }] },
      generationConfig: { temperature: 0, responseMimeType: 'application/json' },
    })
  })

  it('should raise ClassificationFailureError when the key is rejected', async () => {
    const { provider } = createProvider(() => jsonResponse(403, { error: { message: 'API key not valid' } }))

    const error = await provider.chat([{ role: 'user', content: 'hi' }]).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ClassificationFailureError)
    expect(error).toHaveProperty('message', 'Gemini API rejected the API key')
  })

  it('should raise ClassificationFailureError on rate limiting', async () => {
    const { provider } = createProvider(() => jsonResponse(429, {}))

    await expect(provider.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow('Gemini API rate limit exceeded')
  })

  it('should raise ClassificationFailureError for an unexpected response shape', async () => {
    const { provider } = createProvider(() => jsonResponse(200, { candidates: [] }))

    await expect(provider.chat([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(ClassificationFailureError)
  })

  it('should pass timeouts through as TimeoutError', async () => {
    const { provider } = createProvider(() => {
      throw new DOMException('timed out', 'TimeoutError')
    })

    const error = await provider.chat([{ role: 'user', content: 'hi' }]).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(TimeoutError)
    expect(error).toHaveProperty('kind', 'timeout')
  })
})
