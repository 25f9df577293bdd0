import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HtmlPageFetcher, extractPageText } from '../bridge/page-fetcher.js';
import { quietLogger } from './helpers/fakes.js';

const PAGE = `<!doctype html>
<html>
  <head><title>Acme</title><style>body { color: red; }</style></head>
  <body>
    <header>Site header</header>
    <nav>Home | Pricing</nav>
    <main>
      <h1>Acme   Planning</h1>
      <p>Plans for
        small teams.</p>
      <script>window.track = true;</script>
    </main>
    <footer>Copyright</footer>
  </body>
</html>`;

describe('extractPageText', () => {
  it('keeps body text and drops chrome, scripts and styles', () => {
    expect(extractPageText(PAGE)).toBe('Acme Planning Plans for small teams.');
  });

  it('truncates to the character limit', () => {
    expect(extractPageText('<body><p>abcdefghij</p></body>', 4)).toBe('abcd');
  });
});

describe('HtmlPageFetcher', () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns the extracted text of a page', async () => {
    mockFetch.mockResolvedValueOnce({ ok: true, status: 200, text: async () => PAGE });
    const fetcher = new HtmlPageFetcher({ logger: quietLogger });

    expect(await fetcher.fetchText('https://acme.test')).toBe('Acme Planning Plans for small teams.');
    expect(mockFetch.mock.calls[0][0]).toBe('https://acme.test');
  });

  it('returns empty text for an error status', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 404, text: async () => 'missing' });
    const fetcher = new HtmlPageFetcher({ logger: quietLogger });

    expect(await fetcher.fetchText('https://acme.test/missing')).toBe('');
  });

  it('returns empty text when the request fails', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
    const fetcher = new HtmlPageFetcher({ logger: quietLogger });

    expect(await fetcher.fetchText('https://down.test')).toBe('');
  });
});
