import nock from 'nock';
import type { Mock } from 'vitest';
import { HttpCache } from './http-cache.js';
import { MemoryCacheManager } from '../stores/memory-cache-manager.js';
import { IndexedMemoryCacheManager } from '../stores/indexed-memory-cache-manager.js';
import type { CacheManager } from '../stores/cache-manager.js';
import { StorageError } from '../errors/index.js';
import { createLogger } from '../logger.js';

const baseUrl = 'http://example.com';
const key = 'GET:http://example.com/';
const NOW = 1_700_000_000_000;
const logger = createLogger({ level: 'silent' });

function requestAt(
  transport: Mock<typeof fetch>,
  index: number,
): Request {
  const input = transport.mock.calls[index]?.[0];
  if (!(input instanceof Request)) {
    throw new Error(`call ${index} was not made with a Request`);
  }
  return input;
}

describe('HttpCache', () => {
  let manager: MemoryCacheManager;
  let cache: HttpCache;

  beforeEach(() => {
    manager = new MemoryCacheManager();
    cache = new HttpCache({ manager, logger });
  });

  afterEach(() => {
    nock.cleanAll();
    vi.restoreAllMocks();
  });

  describe('default mode', () => {
    test('stores a cacheable response and serves it without the origin', async () => {
      const scope = nock(baseUrl)
        .get('/')
        .reply(200, 'test', { 'cache-control': 'max-age=86400, public' });

      const first = await cache.fetch(`${baseUrl}/`);
      expect(await first.text()).toBe('test');
      expect(first.headers.get('x-cache')).toBe('MISS');
      expect(first.headers.get('x-cache-lookup')).toBe('MISS');
      expect(scope.isDone()).toBe(true);

      const stored = await manager.get(key);
      expect(new TextDecoder().decode(stored?.response.body)).toBe('test');
      expect(stored?.response.url).toBe('http://example.com/');

      const second = await cache.fetch(`${baseUrl}/`);
      expect(second.status).toBe(200);
      expect(await second.text()).toBe('test');
      expect(second.headers.get('x-cache')).toBe('HIT');
      expect(second.headers.get('x-cache-lookup')).toBe('HIT');
      expect(second.headers.get('cache-control')).toBe('max-age=86400, public');
    });

    test('normalises the URL before deriving the key', async () => {
      nock(baseUrl)
        .get('/')
        .reply(200, 'test', { 'cache-control': 'max-age=60' });

      await cache.fetch(baseUrl);

      expect(await manager.get(key)).toBeDefined();
    });

    test('does not store a no-store response', async () => {
      nock(baseUrl)
        .get('/')
        .times(2)
        .reply(200, 'test', { 'cache-control': 'no-store' });

      const first = await cache.fetch(`${baseUrl}/`);
      expect(first.headers.get('x-cache')).toBe('MISS');
      expect(await manager.get(key)).toBeUndefined();

      const second = await cache.fetch(`${baseUrl}/`);
      expect(await second.text()).toBe('test');
    });

    test('does not store a private response in a shared cache', async () => {
      nock(baseUrl)
        .get('/')
        .reply(200, 'test', { 'cache-control': 'private, max-age=60' });

      await cache.fetch(`${baseUrl}/`);

      expect(await manager.get(key)).toBeUndefined();
    });

    test('stores a private response when configured as a private cache', async () => {
      const privateCache = new HttpCache({
        manager,
        logger,
        cacheOptions: { shared: false },
      });
      nock(baseUrl)
        .get('/')
        .reply(200, 'test', { 'cache-control': 'private, max-age=60' });

      await privateCache.fetch(`${baseUrl}/`);

      const stored = await manager.get(key);
      expect(stored?.policy.shared).toBe(false);
    });

    test('forwards a stale response without validators as a miss', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      nock(baseUrl).get('/').reply(200, 'old', { 'cache-control': 'max-age=60' });
      await cache.fetch(`${baseUrl}/`);

      vi.spyOn(Date, 'now').mockReturnValue(NOW + 120_000);
      nock(baseUrl).get('/').reply(200, 'new', { 'cache-control': 'max-age=60' });
      const response = await cache.fetch(`${baseUrl}/`);

      expect(await response.text()).toBe('new');
      expect(response.headers.get('x-cache')).toBe('MISS');
      expect(response.headers.get('x-cache-lookup')).toBe('HIT');
      const stored = await manager.get(key);
      expect(new TextDecoder().decode(stored?.response.body)).toBe('new');
    });
  });

  describe('revalidation', () => {
    const storedHeaders = { 'cache-control': 'max-age=60', etag: '"v1"' };

    async function primeStaleEntry(
      transport: Mock<typeof fetch>,
      revalidatingCache: HttpCache,
    ): Promise<void> {
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      transport.mockResolvedValueOnce(
        new Response('test', { status: 200, headers: storedHeaders }),
      );
      await revalidatingCache.fetch(`${baseUrl}/`);
      vi.spyOn(Date, 'now').mockReturnValue(NOW + 120_000);
    }

    test('merges a 304 and serves the stored body', async () => {
      const transport = vi.fn<typeof fetch>();
      const revalidatingCache = new HttpCache({
        manager,
        logger,
        fetch: transport,
      });
      await primeStaleEntry(transport, revalidatingCache);

      transport.mockResolvedValueOnce(
        new Response(null, {
          status: 304,
          headers: { 'cache-control': 'max-age=600' },
        }),
      );
      const response = await revalidatingCache.fetch(`${baseUrl}/`);

      expect(requestAt(transport, 1).headers.get('if-none-match')).toBe('"v1"');
      expect(response.status).toBe(200);
      expect(await response.text()).toBe('test');
      expect(response.headers.get('x-cache')).toBe('HIT');
      expect(response.headers.get('cache-control')).toBe('max-age=600');

      const stored = await manager.get(key);
      expect(stored?.policy.cacheControl.maxAge).toBe(600);
      expect(stored?.policy.storedAt).toBe(NOW + 120_000);
      expect(stored?.response.headers['etag']).toBe('"v1"');
    });

    test('replaces the entry when the origin sends a new representation', async () => {
      const transport = vi.fn<typeof fetch>();
      const revalidatingCache = new HttpCache({
        manager,
        logger,
        fetch: transport,
      });
      await primeStaleEntry(transport, revalidatingCache);

      transport.mockResolvedValueOnce(
        new Response('updated', {
          status: 200,
          headers: { 'cache-control': 'max-age=60', etag: '"v2"' },
        }),
      );
      const response = await revalidatingCache.fetch(`${baseUrl}/`);

      expect(await response.text()).toBe('updated');
      expect(response.headers.get('x-cache')).toBe('MISS');
      expect(response.headers.get('x-cache-lookup')).toBe('HIT');
      const stored = await manager.get(key);
      expect(stored?.policy.etag).toBe('"v2"');
    });

    test('keeps the stale entry when the replacement is not storable', async () => {
      const transport = vi.fn<typeof fetch>();
      const revalidatingCache = new HttpCache({
        manager,
        logger,
        fetch: transport,
      });
      await primeStaleEntry(transport, revalidatingCache);

      transport.mockResolvedValueOnce(
        new Response('unavailable', { status: 503 }),
      );
      const response = await revalidatingCache.fetch(`${baseUrl}/`);

      expect(response.status).toBe(503);
      expect(await response.text()).toBe('unavailable');
      const stored = await manager.get(key);
      expect(new TextDecoder().decode(stored?.response.body)).toBe('test');
    });
  });

  describe('stale-if-error', () => {
    const url = `${baseUrl}/`;

    async function primeEntry(cacheControl: string): Promise<void> {
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': cacheControl });
      await cache.fetch(url);
      vi.spyOn(Date, 'now').mockReturnValue(NOW + 120_000);
    }

    test('serves the stale entry when the origin answers 5xx', async () => {
      await primeEntry('max-age=60, stale-if-error=3600');
      const scope = nock(baseUrl).get('/').reply(500, 'broken');

      const response = await cache.fetch(url);

      expect(scope.isDone()).toBe(true);
      expect(response.status).toBe(200);
      expect(await response.text()).toBe('test');
      expect(response.headers.get('x-cache')).toBe('HIT');
      expect(response.headers.get('x-cache-lookup')).toBe('HIT');
    });

    test('returns the 5xx once the window has passed', async () => {
      await primeEntry('max-age=60, stale-if-error=30');
      nock(baseUrl).get('/').reply(500, 'broken');

      const response = await cache.fetch(url);

      expect(response.status).toBe(500);
      expect(await response.text()).toBe('broken');
      expect(response.headers.get('x-cache')).toBe('MISS');
    });

    test('does not serve stale under must-revalidate', async () => {
      await primeEntry('max-age=60, must-revalidate, stale-if-error=3600');
      nock(baseUrl).get('/').reply(502, 'bad gateway');

      const response = await cache.fetch(url);

      expect(response.status).toBe(502);
    });

    test('serves the stale entry when a conditional request fails', async () => {
      const transport = vi.fn<typeof fetch>();
      const fallbackCache = new HttpCache({ manager, logger, fetch: transport });
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      transport.mockResolvedValueOnce(
        new Response('test', {
          status: 200,
          headers: {
            'cache-control': 'max-age=60, stale-if-error=3600',
            etag: '"v1"',
          },
        }),
      );
      await fallbackCache.fetch(url);

      vi.spyOn(Date, 'now').mockReturnValue(NOW + 120_000);
      transport.mockRejectedValueOnce(new TypeError('fetch failed'));
      const response = await fallbackCache.fetch(url);

      expect(requestAt(transport, 1).headers.get('if-none-match')).toBe('"v1"');
      expect(response.status).toBe(200);
      expect(await response.text()).toBe('test');
    });

    test('lets the transport error through without the directive', async () => {
      const transport = vi.fn<typeof fetch>();
      const fallbackCache = new HttpCache({ manager, logger, fetch: transport });
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      transport.mockResolvedValueOnce(
        new Response('test', {
          status: 200,
          headers: { 'cache-control': 'max-age=60' },
        }),
      );
      await fallbackCache.fetch(url);

      vi.spyOn(Date, 'now').mockReturnValue(NOW + 120_000);
      const networkError = new TypeError('fetch failed');
      transport.mockRejectedValueOnce(networkError);

      await expect(fallbackCache.fetch(url)).rejects.toBe(networkError);
    });
  });

  describe('with an indexed manager', () => {
    test('a fresh entry is live in the indices and absent from the stale view', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      const indexed = new IndexedMemoryCacheManager();
      const indexedCache = new HttpCache({ manager: indexed, logger });
      nock(baseUrl)
        .get('/')
        .reply(200, 'test', { 'cache-control': 'max-age=86400, public' });

      await indexedCache.fetch(`${baseUrl}/`);

      expect(await indexed.staleView()).toEqual([]);
      const live = await indexed.range('timeToLive', 0, 86_400);
      expect(live.map((entry) => entry.key)).toEqual([key]);
      const tagged = await indexed.lookupByTag('http://example.com/');
      expect(tagged.map((entry) => entry.key)).toEqual([key]);
    });
  });

  describe('cache modes', () => {
    test('no-cache forwards and stores even when a fresh entry exists', async () => {
      const noCache = new HttpCache({ manager, logger, mode: 'no-cache' });
      const scope = nock(baseUrl)
        .get('/')
        .reply(200, 'first', { 'cache-control': 'max-age=86400, public' })
        .get('/')
        .reply(200, 'second', { 'cache-control': 'max-age=600, public' });

      await noCache.fetch(`${baseUrl}/`);
      const second = await noCache.fetch(`${baseUrl}/`);

      expect(scope.isDone()).toBe(true);
      expect(await second.text()).toBe('second');
      expect(second.headers.get('x-cache')).toBe('MISS');
      expect(second.headers.get('x-cache-lookup')).toBe('HIT');
      const stored = await manager.get(key);
      expect(new TextDecoder().decode(stored?.response.body)).toBe('second');
      expect(stored?.policy.cacheControl.maxAge).toBe(600);
    });

    test('no-store neither reads nor writes the cache', async () => {
      nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': 'max-age=60' });

      const bypass = await cache.fetch(`${baseUrl}/`, { cacheMode: 'no-store' });

      expect(await bypass.text()).toBe('test');
      expect(bypass.headers.has('x-cache')).toBe(false);
      expect(await manager.get(key)).toBeUndefined();
    });

    test('reload fetches and stores even when a fresh entry exists', async () => {
      nock(baseUrl).get('/').reply(200, 'first', { 'cache-control': 'max-age=86400' });
      nock(baseUrl).get('/').reply(200, 'second', { 'cache-control': 'max-age=86400' });

      await cache.fetch(`${baseUrl}/`);
      const reloaded = await cache.fetch(`${baseUrl}/`, { cacheMode: 'reload' });

      expect(await reloaded.text()).toBe('second');
      expect(reloaded.headers.get('x-cache-lookup')).toBe('MISS');
      const stored = await manager.get(key);
      expect(new TextDecoder().decode(stored?.response.body)).toBe('second');
    });

    test('force-cache serves a stale entry without the origin', async () => {
      vi.spyOn(Date, 'now').mockReturnValue(NOW);
      nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': 'max-age=60' });
      await cache.fetch(`${baseUrl}/`);

      vi.spyOn(Date, 'now').mockReturnValue(NOW + 3_600_000);
      const response = await cache.fetch(`${baseUrl}/`, {
        cacheMode: 'force-cache',
      });

      expect(await response.text()).toBe('test');
      expect(response.headers.get('x-cache')).toBe('HIT');
    });

    test('only-if-cached answers 504 on a miss', async () => {
      const response = await cache.fetch(`${baseUrl}/`, {
        cacheMode: 'only-if-cached',
      });

      expect(response.status).toBe(504);
      expect(response.headers.get('x-cache')).toBe('MISS');
    });

    test('only-if-cached serves a stored entry', async () => {
      nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': 'max-age=60' });
      await cache.fetch(`${baseUrl}/`);

      const response = await cache.fetch(`${baseUrl}/`, {
        cacheMode: 'only-if-cached',
      });

      expect(response.status).toBe(200);
      expect(await response.text()).toBe('test');
    });

    test('ignore-rules stores a 200 regardless of its headers', async () => {
      const ignoring = new HttpCache({ manager, logger, mode: 'ignore-rules' });
      nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': 'no-store' });

      await ignoring.fetch(`${baseUrl}/`);
      const second = await ignoring.fetch(`${baseUrl}/`);

      expect(await second.text()).toBe('test');
      expect(second.headers.get('x-cache')).toBe('HIT');
    });

    test('ignore-rules does not store other statuses', async () => {
      const ignoring = new HttpCache({ manager, logger, mode: 'ignore-rules' });
      nock(baseUrl).get('/').reply(404, 'missing');

      await ignoring.fetch(`${baseUrl}/`);

      expect(await manager.get(key)).toBeUndefined();
    });

    test('cacheModeFn chooses the mode per request', async () => {
      const chooser = new HttpCache({
        manager,
        logger,
        cacheModeFn: (parts) =>
          parts.url.endsWith('/live') ? 'no-store' : 'default',
      });
      nock(baseUrl)
        .get('/live')
        .reply(200, 'live', { 'cache-control': 'max-age=60' })
        .get('/')
        .reply(200, 'test', { 'cache-control': 'max-age=60' });

      await chooser.fetch(`${baseUrl}/live`);
      await chooser.fetch(`${baseUrl}/`);

      expect(await manager.get('GET:http://example.com/live')).toBeUndefined();
      expect(await manager.get(key)).toBeDefined();
    });

    test('a per-request cacheMode overrides cacheModeFn', async () => {
      const chooser = new HttpCache({
        manager,
        logger,
        cacheModeFn: () => 'no-store',
      });
      nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': 'max-age=60' });

      await chooser.fetch(`${baseUrl}/`, { cacheMode: 'default' });

      expect(await manager.get(key)).toBeDefined();
    });
  });

  describe('stored headers', () => {
    test('keeps every set-cookie value', async () => {
      const transport = vi.fn<typeof fetch>().mockResolvedValueOnce(
        new Response('test', {
          status: 200,
          headers: [
            ['cache-control', 'max-age=60'],
            ['set-cookie', 'a=1'],
            ['set-cookie', 'b=2'],
          ],
        }),
      );
      const cookieCache = new HttpCache({ manager, logger, fetch: transport });

      await cookieCache.fetch(`${baseUrl}/`);

      const stored = await manager.get(key);
      expect(stored?.response.headers['set-cookie']).toBe('a=1, b=2');
    });
  });

  describe('cache keys', () => {
    test('stores under a custom key only', async () => {
      const custom = new HttpCache({
        manager,
        logger,
        cacheKey: (parts) =>
          `${parts.method}:${parts.url}:${parts.httpVersion}:test`,
      });
      nock(baseUrl)
        .get('/')
        .reply(200, 'test', { 'cache-control': 'max-age=86400, public' });

      await custom.fetch(`${baseUrl}/`);

      expect(await manager.get('GET:http://example.com/:1.1:test')).toBeDefined();
      expect(await manager.get(key)).toBeUndefined();
    });
  });

  describe('invalidation', () => {
    beforeEach(async () => {
      nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': 'max-age=60' });
      await cache.fetch(`${baseUrl}/`);
    });

    test('an unsafe method removes the GET entry', async () => {
      nock(baseUrl).post('/').reply(201, 'created');

      const response = await cache.fetch(`${baseUrl}/`, {
        method: 'POST',
        body: 'payload',
      });

      expect(response.status).toBe(201);
      expect(await manager.get(key)).toBeUndefined();
    });

    test('an unsafe method answered with an error leaves the entry', async () => {
      nock(baseUrl).delete('/').reply(500);

      await cache.fetch(`${baseUrl}/`, { method: 'DELETE' });

      expect(await manager.get(key)).toBeDefined();
    });

    test('invalidate removes the entry of a request', async () => {
      await cache.invalidate(`${baseUrl}/`);

      expect(await manager.get(key)).toBeUndefined();
    });
  });

  describe('failures', () => {
    function failingManager(): CacheManager {
      return {
        get: vi
          .fn<CacheManager['get']>()
          .mockRejectedValue(new StorageError('read failed')),
        put: vi
          .fn<CacheManager['put']>()
          .mockRejectedValue(new StorageError('write failed')),
        delete: vi
          .fn<CacheManager['delete']>()
          .mockRejectedValue(new StorageError('delete failed')),
        clear: vi.fn<CacheManager['clear']>().mockResolvedValue(undefined),
      };
    }

    test('a failing cache read or write still returns the origin response', async () => {
      const failing = new HttpCache({ manager: failingManager(), logger });
      nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': 'max-age=60' });

      const response = await failing.fetch(`${baseUrl}/`);

      expect(response.status).toBe(200);
      expect(await response.text()).toBe('test');
      expect(response.headers.get('x-cache')).toBe('MISS');
    });

    test('a failing delete still returns the origin response', async () => {
      const failing = new HttpCache({ manager: failingManager(), logger });
      nock(baseUrl).put('/').reply(200, 'updated');

      const response = await failing.fetch(`${baseUrl}/`, { method: 'PUT' });

      expect(response.status).toBe(200);
    });

    test('transport errors propagate unchanged', async () => {
      const networkError = new TypeError('fetch failed');
      const transport = vi.fn<typeof fetch>().mockRejectedValue(networkError);
      const failing = new HttpCache({ manager, logger, fetch: transport });

      await expect(failing.fetch(`${baseUrl}/`)).rejects.toBe(networkError);
      expect(await manager.get(key)).toBeUndefined();
    });
  });

  test('createFetch returns a caching fetch', async () => {
    const fetchWithCache = cache.createFetch();
    nock(baseUrl).get('/').reply(200, 'test', { 'cache-control': 'max-age=60' });

    await fetchWithCache(`${baseUrl}/`);
    const second = await fetchWithCache(new Request(`${baseUrl}/`));

    expect(second.headers.get('x-cache')).toBe('HIT');
  });
});
