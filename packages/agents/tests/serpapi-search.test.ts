import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SerpApiSearch } from '../bridge/serpapi-search.js';
import { SearchError } from '../utils/errors.js';
import { quietLogger } from './helpers/fakes.js';

function okResponse(body: unknown) {
  return { ok: true, status: 200, json: async () => body, text: async () => JSON.stringify(body) };
}

const ORGANIC = {
  organic_results: [
    { title: 'Acme - Home', snippet: 'Planning software', link: 'https://acme.test' },
    { title: 'Acme review', snippet: 'A review', link: 'https://reviews.test/acme' },
    { title: 'No link entry' },
  ],
};

describe('SerpApiSearch', () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function client(overrides: { rateLimit?: number; cacheTtl?: number; timeoutMs?: number; apiKey?: string } = {}) {
    return new SerpApiSearch({
      apiKey: 'test-secret',
      baseUrl: 'https://serp.test/search.json',
      logger: quietLogger,
      ...overrides,
    });
  }

  it('builds the request and maps organic results', async () => {
    mockFetch.mockResolvedValueOnce(okResponse(ORGANIC));

    const results = await client().search('Acme company overview', { limit: 3 });

    const url = new URL(mockFetch.mock.calls[0][0]);
    expect(url.origin + url.pathname).toBe('https://serp.test/search.json');
    expect(url.searchParams.get('engine')).toBe('google');
    expect(url.searchParams.get('q')).toBe('Acme company overview');
    expect(url.searchParams.get('num')).toBe('3');
    expect(url.searchParams.get('api_key')).toBe('test-secret');
    expect(results).toEqual([
      { title: 'Acme - Home', snippet: 'Planning software', url: 'https://acme.test' },
      { title: 'Acme review', snippet: 'A review', url: 'https://reviews.test/acme' },
      { title: 'No link entry', snippet: '', url: '' },
    ]);
  });

  it('returns at most the requested number of results', async () => {
    mockFetch.mockResolvedValueOnce(okResponse(ORGANIC));
    const results = await client().search('Acme', { limit: 1 });
    expect(results).toHaveLength(1);
  });

  it('caches results per query and limit', async () => {
    mockFetch.mockResolvedValue(okResponse(ORGANIC));
    const search = client();

    await search.search('Acme', { limit: 3 });
    await search.search('Acme', { limit: 3 });
    expect(mockFetch).toHaveBeenCalledTimes(1);

    await search.search('Acme', { limit: 5 });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('skips the cache when the TTL is 0', async () => {
    mockFetch.mockResolvedValue(okResponse(ORGANIC));
    const search = client({ cacheTtl: 0 });

    await search.search('Acme');
    await search.search('Acme');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('treats a no-results error as an empty list', async () => {
    mockFetch.mockResolvedValueOnce(okResponse({ error: "Google hasn't returned any results for this query." }));
    expect(await client().search('zzzz')).toEqual([]);
  });

  it('raises other API errors', async () => {
    mockFetch.mockResolvedValueOnce(okResponse({ error: 'Your account has run out of searches.' }));
    await expect(client().search('Acme')).rejects.toThrow('Search: Your account has run out of searches.');
  });

  it.each([
    [401, 'Search: Invalid API key'],
    [403, 'Search: Account not allowed to run this search'],
    [429, 'Search: Quota or rate limit exceeded'],
  ])('maps HTTP %i to a readable error', async (status, message) => {
    mockFetch.mockResolvedValueOnce({ ok: false, status, text: async () => 'nope' });
    const error = await client().search('Acme').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchError);
    if (!(error instanceof SearchError)) return;
    expect(error.message).toBe(message);
    expect(error.status).toBe(status);
  });

  it('includes the body of other HTTP errors', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 500, text: async () => 'upstream exploded' });
    await expect(client().search('Acme')).rejects.toThrow('Search: HTTP 500: upstream exploded');
  });

  it('rejects an unexpected response shape', async () => {
    mockFetch.mockResolvedValueOnce(okResponse({ organic_results: 'not a list' }));
    await expect(client().search('Acme')).rejects.toThrow('Search: Unexpected response shape');
  });

  it('wraps network failures', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(client().search('Acme')).rejects.toThrow('Search request failed: fetch failed');
  });

  it('aborts a request that takes too long', async () => {
    mockFetch.mockImplementationOnce((_url: string, init: RequestInit) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
      }));

    await expect(client({ timeoutMs: 20 }).search('Acme')).rejects.toThrow('Search timed out after 20ms');
  });

  it('enforces the per-minute rate limit', async () => {
    mockFetch.mockResolvedValue(okResponse(ORGANIC));
    const search = client({ rateLimit: 2, cacheTtl: 0 });

    await search.search('a');
    await search.search('b');
    await expect(search.search('c')).rejects.toThrow('Search rate limit exceeded (2 req/min). Try again shortly.');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('fails fast without an API key', async () => {
    await expect(client({ apiKey: '' }).search('Acme')).rejects.toThrow('SERPAPI_KEY is not set');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
