// External collaborator contracts consumed by the orchestration core.
// Each is a narrow request/response seam; concrete adapters live in bridge/.

import type { ChartArtifact, ChartData } from './analysis.js';

export interface SearchResult {
  title: string;
  snippet: string;
  url: string;
}

export interface SearchOptions {
  limit?: number;
}

export interface SearchProvider {
  /** Ordered results; rejects with SearchError on network/quota issues. */
  search(query: string, options?: SearchOptions): Promise<SearchResult[]>;
}

export interface GenerationProvider {
  /** Rejects with GenerationError on quota/timeout/malformed response. */
  generate(prompt: string): Promise<string>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface PageFetcher {
  /** Plain-text page content, empty when the page could not be read. */
  fetchText(url: string): Promise<string>;
}

export interface ReportExporter {
  /** Writes a report document and returns where it landed. */
  exportReport(filename: string, content: string): Promise<string>;
}

export interface ChartRenderer {
  render(data: ChartData, companies: string[]): Promise<ChartArtifact>;
}
