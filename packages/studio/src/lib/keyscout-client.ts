import type {
  ChatResponse,
  ChatSessionSnapshot,
  CountsResponse,
  HealthStatus,
  SecretDescriptionResponse,
  SecretListResponse,
  SecretTypeFilter,
  SecretValueResponse,
  TypeBreakdown,
} from '../types/keyscout';

export class KeyscoutApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'KeyscoutApiError';
  }
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface KeyscoutClientOptions {
  baseUrl?: string;
  apiKey?: string;
  fetchImpl?: FetchLike;
}

function readErrorBody(body: unknown): { error?: string; code?: string } {
  if (typeof body !== 'object' || body === null) return {};
  const error = 'error' in body && typeof body.error === 'string' ? body.error : undefined;
  const code = 'code' in body && typeof body.code === 'string' ? body.code : undefined;
  return { error, code };
}

/**
 * REST client for the keyscout API service
 */
export class KeyscoutClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: KeyscoutClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? '').replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  health(): Promise<HealthStatus> {
    return this.request('GET', '/api/v1/health');
  }

  chat(message: string, sessionId?: string | null): Promise<ChatResponse> {
    return this.request('POST', '/api/v1/chat', sessionId ? { message, sessionId } : { message });
  }

  getTranscript(sessionId: string): Promise<ChatSessionSnapshot> {
    return this.request('GET', `/api/v1/chat/${encodeURIComponent(sessionId)}`);
  }

  async clearSession(sessionId: string): Promise<void> {
    await this.send('DELETE', `/api/v1/chat/${encodeURIComponent(sessionId)}`);
  }

  listSecrets(filter: { pathPrefix?: string; type?: SecretTypeFilter } = {}): Promise<SecretListResponse> {
    const params = new URLSearchParams();
    if (filter.pathPrefix) params.set('pathPrefix', filter.pathPrefix);
    if (filter.type && filter.type !== 'all') params.set('type', filter.type);
    const query = params.toString();
    return this.request('GET', `/api/v1/secrets${query ? `?${query}` : ''}`);
  }

  getSecretValue(path: string, type?: SecretTypeFilter): Promise<SecretValueResponse> {
    const params = new URLSearchParams({ path });
    if (type && type !== 'all') params.set('type', type);
    return this.request('GET', `/api/v1/secrets/value?${params.toString()}`);
  }

  describeSecret(path: string): Promise<SecretDescriptionResponse> {
    return this.request('GET', `/api/v1/secrets/describe?${new URLSearchParams({ path }).toString()}`);
  }

  getCounts(): Promise<CountsResponse> {
    return this.request('GET', '/api/v1/analytics/counts');
  }

  getBreakdown(): Promise<TypeBreakdown> {
    return this.request('GET', '/api/v1/analytics/breakdown');
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const response = await this.send(method, path, body);
    const payload: T = await response.json();
    return payload;
  }

  private async send(method: string, path: string, body?: unknown): Promise<Response> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) headers['Content-Type'] = 'application/json';
    if (this.options.apiKey) headers['x-api-key'] = this.options.apiKey;

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!response.ok) {
      const payload: unknown = await response.json().catch(() => null);
      const { error, code } = readErrorBody(payload);
      throw new KeyscoutApiError(response.status, code ?? 'http_error', error ?? `Request failed with status ${response.status}`);
    }
    return response;
  }
}

// Singleton instance; Vite proxies /api to the API service in development
export const keyscoutClient = new KeyscoutClient({
  apiKey: import.meta.env.VITE_KEYSCOUT_API_KEY,
});
