// SerpAPI search client with caching and rate limiting

import { z } from 'zod';
import type { SearchOptions, SearchProvider, SearchResult } from '../types/collaborators.js';
import { SearchError, describeError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_SERPAPI_BASE } from '../config/settings.js';

export interface SerpApiConfig {
  apiKey: string;
  baseUrl?: string;
  /** Requests per minute (default: 60) */
  rateLimit?: number;
  /** Seconds; 0 disables caching (default: 300) */
  cacheTtl?: number;
  /** Per-request timeout (default: 10s) */
  timeoutMs?: number;
  logger?: Logger;
}

const OrganicResultSchema = z.object({
  title: z.string().default(''),
  snippet: z.string().default(''),
  link: z.string().default(''),
});

const SerpApiResponseSchema = z.object({
  organic_results: z.array(OrganicResultSchema).default([]),
  error: z.string().optional(),
});

const NO_RESULTS = /hasn't returned any results/i;

interface CacheEntry {
  data: SearchResult[];
  expiresAt: number;
}

export class SerpApiSearch implements SearchProvider {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly rateLimit: number;
  private readonly cacheTtl: number;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly cache = new Map<string, CacheEntry>();
  private requestTimestamps: number[] = [];

  constructor(config: SerpApiConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULT_SERPAPI_BASE;
    this.rateLimit = config.rateLimit ?? 60;
    this.cacheTtl = config.cacheTtl ?? 300;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.log = config.logger ?? createLogger('SerpApi');
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchResult[]> {
    if (!this.apiKey) {
      throw new SearchError('SERPAPI_KEY is not set');
    }
    const limit = options.limit ?? 5;

    const url = new URL(this.baseUrl);
    url.searchParams.set('engine', 'google');
    url.searchParams.set('q', query);
    url.searchParams.set('num', String(limit));
    url.searchParams.set('api_key', this.apiKey);

    // Cache key without the key itself
    const cacheKey = `${query}\u0000${limit}`;
    const cached = this.getCached(cacheKey);
    if (cached) return cached;

    if (this.isRateLimited()) {
      throw new SearchError(`Search rate limit exceeded (${this.rateLimit} req/min). Try again shortly.`, 429);
    }
    this.requestTimestamps.push(Date.now());

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let body: unknown;
    try {
      const res = await fetch(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        if (res.status === 401) throw new SearchError('Search: Invalid API key', 401);
        if (res.status === 403) throw new SearchError('Search: Account not allowed to run this search', 403);
        if (res.status === 429) throw new SearchError('Search: Quota or rate limit exceeded', 429);
        throw new SearchError(`Search: HTTP ${res.status}: ${text.slice(0, 200)}`, res.status);
      }

      body = await res.json();
    } catch (err) {
      if (err instanceof SearchError) throw err;
      if (controller.signal.aborted) {
        throw new SearchError(`Search timed out after ${this.timeoutMs}ms`, undefined, err);
      }
      throw new SearchError(`Search request failed: ${describeError(err)}`, undefined, err);
    } finally {
      clearTimeout(timeout);
    }

    const parsed = SerpApiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchError('Search: Unexpected response shape', undefined, parsed.error);
    }
    if (parsed.data.error && !NO_RESULTS.test(parsed.data.error)) {
      throw new SearchError(`Search: ${parsed.data.error}`);
    }

    const results = parsed.data.organic_results
      .slice(0, limit)
      .map(r => ({ title: r.title, snippet: r.snippet, url: r.link }));

    this.log.debug('Search complete', { query, results: results.length });
    this.setCache(cacheKey, results);
    return results;
  }

  private isRateLimited(): boolean {
    const now = Date.now();
    this.requestTimestamps = this.requestTimestamps.filter(t => now - t < 60_000);
    return this.requestTimestamps.length >= this.rateLimit;
  }

  private getCached(key: string): SearchResult[] | undefined {
    if (this.cacheTtl <= 0) return undefined;
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.data;
  }

  private setCache(key: string, data: SearchResult[]): void {
    if (this.cacheTtl <= 0) return;
    this.cache.set(key, { data, expiresAt: Date.now() + this.cacheTtl * 1000 });
    // Evict expired entries if the cache grows too large
    if (this.cache.size > 500) {
      const now = Date.now();
      for (const [k, v] of this.cache) {
        if (now > v.expiresAt) this.cache.delete(k);
      }
    }
  }
}
