// Researcher: company profile (search + optional page enrichment) and
// competitor discovery.

import type { PageFetcher, SearchResult } from '../types/collaborators.js';
import { GenerationError } from '../utils/errors.js';
import { MIN_COMPETITORS, parseCompetitorList } from '../utils/analysis-parsers.js';
import { BaseAgent, type AgentDeps } from './base-agent.js';
import { competitorPrompt, researchPrompt, type PageExcerpt } from './prompts.js';

export const OVERVIEW_RESULTS = 3;
export const COMPETITOR_RESULTS = 5;
export const PAGES_TO_FETCH = 2;

export interface ResearcherDeps extends AgentDeps {
  pageFetcher?: PageFetcher;
}

export class Researcher extends BaseAgent {
  private readonly pageFetcher?: PageFetcher;

  constructor(deps: ResearcherDeps) {
    super('researcher', deps);
    this.pageFetcher = deps.pageFetcher;
  }

  async research(company: string): Promise<string> {
    const results = await this.search.search(
      `${company} company overview products services`,
      { limit: OVERVIEW_RESULTS },
    );
    const pages = await this.fetchPages(results);
    return this.generate(researchPrompt(company, results, pages));
  }

  /** 3-5 competitor names; fewer than three is a failure. */
  async discoverCompetitors(company: string): Promise<string[]> {
    const results = await this.search.search(
      `${company} competitors alternatives similar companies`,
      { limit: COMPETITOR_RESULTS },
    );
    const answer = await this.generate(competitorPrompt(company, results));

    const ownName = company.trim().toLowerCase();
    const competitors = parseCompetitorList(answer).filter(c => c.toLowerCase() !== ownName);
    if (competitors.length < MIN_COMPETITORS) {
      throw new GenerationError(
        `Found only ${competitors.length} competitor${competitors.length === 1 ? '' : 's'} ` +
        `for ${company} (need at least ${MIN_COMPETITORS})`,
      );
    }
    return competitors;
  }

  private async fetchPages(results: SearchResult[]): Promise<PageExcerpt[]> {
    const fetcher = this.pageFetcher;
    if (!fetcher) return [];

    const pages = await Promise.all(
      results
        .filter(r => r.url)
        .slice(0, PAGES_TO_FETCH)
        .map(async r => ({ url: r.url, content: await fetcher.fetchText(r.url) })),
    );
    const readable = pages.filter(p => p.content.length > 0);
    this.log.debug('Fetched pages', { requested: pages.length, readable: readable.length });
    return readable;
  }
}
