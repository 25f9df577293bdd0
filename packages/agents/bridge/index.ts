export { SerpApiSearch, type SerpApiConfig } from './serpapi-search.js';
export { AnthropicGenerator, type AnthropicGeneratorConfig } from './anthropic-generator.js';
export { HtmlPageFetcher, extractPageText, MAX_PAGE_CHARS, type HtmlPageFetcherConfig } from './page-fetcher.js';
export { MarkdownReportExporter, JsonChartRenderer } from './file-exporters.js';
