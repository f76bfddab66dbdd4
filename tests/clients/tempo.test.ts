import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TempoClient, extractUpstreamMessage } from '../../src/clients/tempo.js';
import type { ApiResult, TempoConfig } from '../../src/types/index.js';
import type { TempoApiError } from '../../src/errors/index.js';

function expectFailure(result: ApiResult): TempoApiError {
  if (result.ok) {
    throw new Error('expected the request to fail');
  }
  return result.error;
}

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

// Never settles on its own; rejects once the request signal aborts
function hangUntilAborted(_input: unknown, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(init.signal?.reason));
  });
}

describe('TempoClient', () => {
  const mockFetch = vi.fn<typeof fetch>();
  const config: TempoConfig = {
    apiKey: 'test-api-key',
    baseUrl: 'https://api.example.test/api/v1/',
    userAgent: 'tempoai-mcp-server/test',
    timeoutMs: 1000,
  };
  let client: TempoClient;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'error').mockImplementation(() => {});
    client = new TempoClient(config);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('request', () => {
    it('should send an authenticated GET and decode JSON', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ workouts: [], total: 0 }));

      const result = await client.request('/mcp/workouts');

      expect(result).toEqual({ ok: true, data: { workouts: [], total: 0 } });
      expect(mockFetch).toHaveBeenCalledTimes(1);
      const [url, init] = mockFetch.mock.calls[0];
      expect(url).toBe('https://api.example.test/api/v1/mcp/workouts');
      expect(init).toMatchObject({
        method: 'GET',
        headers: {
          Authorization: 'Bearer test-api-key',
          Accept: 'application/json',
          'User-Agent': 'tempoai-mcp-server/test',
        },
      });
    });

    it('should encode query parameters and skip undefined ones', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([]));

      await client.request('/mcp/workouts', {
        params: { start_date: '2024-01-01', end_date: undefined, limit: 10 },
      });

      expect(mockFetch.mock.calls[0][0]).toBe(
        'https://api.example.test/api/v1/mcp/workouts?start_date=2024-01-01&limit=10'
      );
    });

    it('should prefer a per-call API key', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      await client.request('/mcp/events', { apiKey: '  other-key  ' });

      expect(mockFetch.mock.calls[0][1]).toMatchObject({
        headers: { Authorization: 'Bearer other-key' },
      });
    });

    it('should ignore a blank per-call API key', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      await client.request('/mcp/events', { apiKey: '   ' });

      expect(mockFetch.mock.calls[0][1]).toMatchObject({
        headers: { Authorization: 'Bearer test-api-key' },
      });
    });

    it('should fail without calling the API when no key is available', async () => {
      const keyless = new TempoClient({ ...config, apiKey: '' });

      const error = expectFailure(await keyless.request('/mcp/workouts'));

      expect(error.kind).toBe('auth_missing');
      expect(error.message).toBe(
        'No API key available. Set API_KEY in the environment or pass api_key with the request.'
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should report HTTP errors with the upstream message', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ detail: 'Workout not found' }, 404));

      const error = expectFailure(await client.request('/mcp/workouts/999'));

      expect(error.kind).toBe('http_status');
      expect(error.statusCode).toBe(404);
      expect(error.isRetryable).toBe(false);
      expect(error.message).toBe('Tempo AI API error (404): Workout not found');
      expect(error.context.resource).toBe('/mcp/workouts/999');
    });

    it('should fall back to the status text for empty error bodies', async () => {
      mockFetch.mockResolvedValueOnce(
        new Response('', { status: 503, statusText: 'Service Unavailable' })
      );

      const error = expectFailure(await client.request('/mcp/wellness'));

      expect(error.message).toBe('Tempo AI API error (503): Service Unavailable');
      expect(error.isRetryable).toBe(true);
    });

    it('should report network failures with their cause', async () => {
      mockFetch.mockRejectedValueOnce(
        new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND api.example.test') })
      );

      const error = expectFailure(await client.request('/mcp/workouts'));

      expect(error.kind).toBe('network');
      expect(error.message).toBe(
        'Unable to reach Tempo AI: fetch failed (getaddrinfo ENOTFOUND api.example.test)'
      );
    });

    it('should time out slow requests', async () => {
      const impatient = new TempoClient({ ...config, timeoutMs: 20 });
      mockFetch.mockImplementationOnce(hangUntilAborted);

      const error = expectFailure(await impatient.request('/mcp/workouts'));

      expect(error.kind).toBe('network');
      expect(error.isRetryable).toBe(true);
      expect(error.message).toBe('Request to Tempo AI timed out after 20ms');
    });

    it('should stop when the caller cancels', async () => {
      const controller = new AbortController();
      mockFetch.mockImplementationOnce(hangUntilAborted);

      const pending = client.request('/mcp/workouts', { signal: controller.signal });
      controller.abort();
      const error = expectFailure(await pending);

      expect(error.kind).toBe('network');
      expect(error.isRetryable).toBe(false);
      expect(error.message).toBe('Request to Tempo AI was cancelled');
    });

    it('should report bodies that are not JSON', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<html>oops</html>', { status: 200 }));

      const error = expectFailure(await client.request('/mcp/workouts'));

      expect(error.kind).toBe('decode');
      expect(error.message).toMatch(/^Tempo AI returned a response that is not valid JSON \(.+\)$/);
    });

    it('should return null for empty successful responses', async () => {
      mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

      expect(await client.request('/mcp/events/1')).toEqual({ ok: true, data: null });
    });

    it('should log each request to stderr', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}));

      await client.request('/mcp/events');

      expect(console.error).toHaveBeenCalledWith(
        expect.stringMatching(/^\[Tempo\] GET \/mcp\/events 200 \(\d+ms\)$/)
      );
    });
  });

  describe('extractUpstreamMessage', () => {
    it('should read the usual JSON fields', () => {
      expect(extractUpstreamMessage('{"message":"Bad request"}')).toBe('Bad request');
      expect(extractUpstreamMessage('{"detail":"Not found"}')).toBe('Not found');
      expect(extractUpstreamMessage('{"error":"Unauthorized"}')).toBe('Unauthorized');
    });

    it('should collapse plain text to one line', () => {
      expect(extractUpstreamMessage('<html>\n  <body>Oops</body>\n</html>')).toBe(
        '<html> <body>Oops</body> </html>'
      );
    });

    it('should use the raw body when JSON has no message', () => {
      expect(extractUpstreamMessage('{"error":""}')).toBe('{"error":""}');
    });

    it('should truncate long bodies', () => {
      expect(extractUpstreamMessage('x'.repeat(250))).toBe(`${'x'.repeat(200)}...`);
    });

    it('should return undefined for blank bodies', () => {
      expect(extractUpstreamMessage('   ')).toBeUndefined();
    });
  });
});
