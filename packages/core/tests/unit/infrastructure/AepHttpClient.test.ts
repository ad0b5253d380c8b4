import { describe, it, expect, vi } from 'vitest';
import { AepHttpClient } from '../../../src/infrastructure/http/AepHttpClient.js';
import type { AepHttpClientConfig, RetryNotice } from '../../../src/infrastructure/http/AepHttpClient.js';
import type { TokenProvider } from '../../../src/domain/ports/TokenProvider.js';
import { StaticTokenProvider } from '../../../src/infrastructure/auth/StaticTokenProvider.js';
import {
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ServiceError,
} from '../../../src/domain/errors/AepError.js';
import {
  TEST_CONNECTION,
  bodyText,
  createFakeFetch,
  emptyResponse,
  jsonResponse,
  sequence,
} from '../../helpers/fakePlatform.js';
import type { Handler } from '../../helpers/fakePlatform.js';

function createClient(handler: Handler, overrides: Partial<AepHttpClientConfig> = {}) {
  const fake = createFakeFetch(handler);
  const client = new AepHttpClient({
    ...TEST_CONNECTION,
    tokenProvider: new StaticTokenProvider('test-token'),
    retry: { retryDelayMs: 0 },
    fetch: fake.fetch,
    ...overrides,
  });
  return { client, requests: fake.requests };
}

describe('AepHttpClient', () => {
  describe('requests', () => {
    it('should send the platform headers with every request', async () => {
      const { client, requests } = createClient(() => jsonResponse({ ok: true }));

      await client.get('/data/foundation/catalog/batches/b1');

      const [request] = requests;
      expect(request?.url.toString()).toBe('https://platform.test/data/foundation/catalog/batches/b1');
      expect(request?.headers.get('authorization')).toBe('Bearer test-token');
      expect(request?.headers.get('x-api-key')).toBe('test-client');
      expect(request?.headers.get('x-gw-ims-org-id')).toBe('TEST@AdobeOrg');
      expect(request?.headers.get('x-sandbox-name')).toBe('dev');
      expect(request?.headers.get('accept')).toBe('application/json');
    });

    it('should serialise JSON bodies', async () => {
      const { client, requests } = createClient(() => jsonResponse({ id: 'b1' }, 201));

      const body = await client.post('/batches', { json: { datasetId: 'd1' } });

      expect(body).toEqual({ id: 'b1' });
      expect(requests[0]?.headers.get('content-type')).toBe('application/json');
      expect(requests[0] && bodyText(requests[0])).toBe('{"datasetId":"d1"}');
    });

    it('should send raw bodies with their content type', async () => {
      const { client, requests } = createClient(() => emptyResponse(200));

      await client.put('/files/a.csv', { body: Buffer.from('a,b\n'), contentType: 'text/csv' });

      expect(requests[0]?.headers.get('content-type')).toBe('text/csv');
      expect(requests[0] && bodyText(requests[0])).toBe('a,b\n');
    });

    it('should skip undefined query values and tolerate a trailing slash on the base URL', async () => {
      const { client, requests } = createClient(() => jsonResponse({}), { baseUrl: 'https://platform.test/' });

      await client.get('/data/foundation/catalog/batches', { query: { limit: 10, dataSet: undefined, status: 'success' } });

      expect(requests[0]?.url.toString()).toBe(
        'https://platform.test/data/foundation/catalog/batches?limit=10&status=success',
      );
    });

    it('should repeat a query parameter given as an array', async () => {
      const { client, requests } = createClient(() => jsonResponse({ items: [] }));

      await client.get('/runs', { query: { property: ['flowId==f1', 'createdAt>=5'], limit: 10 } });

      expect(requests[0]?.url.searchParams.getAll('property')).toEqual(['flowId==f1', 'createdAt>=5']);
      expect(requests[0]?.url.searchParams.get('limit')).toBe('10');
    });

    it('should return undefined for empty responses and text for non-JSON ones', async () => {
      const { client } = createClient(
        sequence(
          () => emptyResponse(204),
          () => new Response('accepted', { status: 200, headers: { 'content-type': 'text/plain' } }),
        ),
      );

      expect(await client.post('/a')).toBeUndefined();
      expect(await client.post('/b')).toBe('accepted');
    });
  });

  describe('error mapping', () => {
    it('should fail immediately on 400 with the remote body', async () => {
      const { client, requests } = createClient(() =>
        jsonResponse({ title: 'Bad Request', detail: 'inputFormat.format is invalid' }, 400),
      );

      const error = await client.post('/batches', { json: {} }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceError);
      expect(error).not.toBeInstanceOf(RateLimitError);
      expect(requests).toHaveLength(1);
      if (!(error instanceof ServiceError)) return;
      expect(error.status).toBe(400);
      expect(error.code).toBe('SERVICE');
      expect(error.body).toEqual({ title: 'Bad Request', detail: 'inputFormat.format is invalid' });
      expect(error.message).toBe('POST /batches failed with HTTP 400: Bad Request - inputFormat.format is invalid');
    });

    it('should map 404 to NotFoundError without retrying', async () => {
      const { client, requests } = createClient(() => jsonResponse({ title: 'Not Found' }, 404));

      await expect(client.get('/missing')).rejects.toBeInstanceOf(NotFoundError);
      expect(requests).toHaveLength(1);
    });

    it('should include a plain-text body in the message', async () => {
      const { client } = createClient(() => new Response('quota exceeded', { status: 403 }));

      await expect(client.get('/x')).rejects.toThrow('GET /x failed with HTTP 403: quota exceeded');
    });
  });

  describe('retries', () => {
    it('should retry 429 exactly three times before succeeding', async () => {
      const onRetry = vi.fn<(notice: RetryNotice) => void>();
      const { client, requests } = createClient(
        sequence(
          () => jsonResponse({ title: 'Too Many Requests' }, 429),
          () => jsonResponse({ title: 'Too Many Requests' }, 429),
          () => jsonResponse({ title: 'Too Many Requests' }, 429),
          () => jsonResponse({ id: 'b1' }),
        ),
        { onRetry },
      );

      await expect(client.get('/batches/b1')).resolves.toEqual({ id: 'b1' });

      expect(onRetry).toHaveBeenCalledTimes(3);
      expect(requests).toHaveLength(4);
      expect(onRetry.mock.calls.map(([n]) => n.attempt)).toEqual([1, 2, 3]);
    });

    it('should double the delay between retries', async () => {
      const onRetry = vi.fn<(notice: RetryNotice) => void>();
      const { client } = createClient(
        sequence(
          () => emptyResponse(503),
          () => emptyResponse(502),
          () => emptyResponse(500),
          () => jsonResponse({}),
        ),
        { onRetry, retry: { retryDelayMs: 1 } },
      );

      await client.get('/x');

      expect(onRetry.mock.calls.map(([n]) => n.delayMs)).toEqual([1, 2, 4]);
      expect(onRetry.mock.calls.map(([n]) => n.error)).toEqual([
        expect.any(ServerError),
        expect.any(ServerError),
        expect.any(ServerError),
      ]);
    });

    it('should give up after maxAttempts requests and surface the last error', async () => {
      const { client, requests } = createClient(() => jsonResponse({ message: 'unavailable' }, 503), {
        retry: { maxAttempts: 3, retryDelayMs: 0 },
      });

      await expect(client.get('/x')).rejects.toThrow('GET /x failed with HTTP 503: unavailable');
      expect(requests).toHaveLength(3);
    });

    it('should retry network failures', async () => {
      let calls = 0;
      const { client } = createClient(() => {
        calls++;
        if (calls === 1) throw new TypeError('fetch failed');
        return jsonResponse({ ok: true });
      });

      await expect(client.get('/x')).resolves.toEqual({ ok: true });
      expect(calls).toBe(2);
    });

    it('should raise NetworkError with status 0 once network retries are exhausted', async () => {
      const { client } = createClient(
        () => {
          throw new TypeError('fetch failed');
        },
        { retry: { maxAttempts: 2, retryDelayMs: 0 } },
      );

      const error = await client.get('/x').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      if (error instanceof NetworkError) {
        expect(error.status).toBe(0);
        expect(error.message).toBe('GET /x fetch failed');
      }
    });

    it('should not let a throwing onRetry callback break the request', async () => {
      const { client } = createClient(sequence(() => emptyResponse(500), () => jsonResponse({ ok: true })), {
        onRetry: () => {
          throw new Error('listener broke');
        },
      });

      await expect(client.get('/x')).resolves.toEqual({ ok: true });
    });
  });

  describe('authentication', () => {
    it('should refresh the token once on 401 without using the retry budget', async () => {
      let issued = 0;
      const tokenProvider: TokenProvider = {
        getToken: () => Promise.resolve(`test-token-${String(++issued)}`),
        invalidate: vi.fn(),
      };
      const { client, requests } = createClient(
        sequence(() => jsonResponse({ title: 'Unauthorized' }, 401), () => jsonResponse({ ok: true })),
        { tokenProvider, retry: { maxAttempts: 1, retryDelayMs: 0 } },
      );

      await expect(client.get('/x')).resolves.toEqual({ ok: true });

      expect(tokenProvider.invalidate).toHaveBeenCalledOnce();
      expect(requests.map((r) => r.headers.get('authorization'))).toEqual(['Bearer test-token-1', 'Bearer test-token-2']);
    });

    it('should fail when the refreshed token is also rejected', async () => {
      const { client, requests } = createClient(() => jsonResponse({ title: 'Unauthorized' }, 401));

      const error = await client.get('/x').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceError);
      expect(requests).toHaveLength(2);
    });
  });
});
