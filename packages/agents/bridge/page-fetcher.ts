// Readable text from a web page, for enriching company research

import * as cheerio from 'cheerio';
import type { PageFetcher } from '../types/collaborators.js';
import { describeError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const MAX_PAGE_CHARS = 5000;

export interface HtmlPageFetcherConfig {
  timeoutMs?: number;
  maxChars?: number;
  logger?: Logger;
}

/** Strip non-content elements and collapse whitespace. */
export function extractPageText(html: string, maxChars = MAX_PAGE_CHARS): string {
  const $ = cheerio.load(html);
  $('script, style, noscript, nav, header, footer, iframe, svg').remove();
  const text = $('body').text().replace(/\s+/g, ' ').trim();
  return text.slice(0, maxChars);
}

export class HtmlPageFetcher implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly maxChars: number;
  private readonly log: Logger;

  constructor(config: HtmlPageFetcherConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.maxChars = config.maxChars ?? MAX_PAGE_CHARS;
    this.log = config.logger ?? createLogger('PageFetcher');
  }

  /** Page text, or '' when the page cannot be read. Never rejects. */
  async fetchText(url: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(url, {
        headers: {
          'User-Agent': 'Mozilla/5.0 (compatible; competitive-intel/0.1)',
          'Accept': 'text/html,application/xhtml+xml',
        },
        signal: controller.signal,
      });
      if (!res.ok) {
        this.log.warn('Page fetch failed', { url, status: res.status });
        return '';
      }
      return extractPageText(await res.text(), this.maxChars);
    } catch (err) {
      this.log.warn('Page fetch failed', { url, error: describeError(err) });
      return '';
    } finally {
      clearTimeout(timeout);
    }
  }
}
