// Analyst: competitive analysis, SWOT and pricing strategy.

import type { SwotAnalysis } from '../types/analysis.js';
import { GenerationError } from '../utils/errors.js';
import { missingSwotParts, parseSwot } from '../utils/analysis-parsers.js';
import { BaseAgent, type AgentDeps } from './base-agent.js';
import {
  competitiveAnalysisPrompt,
  pricingPrompt,
  swotPrompt,
  type PricingEvidence,
} from './prompts.js';

export const PRICING_RESULTS = 3;
/** Competitors whose pricing is searched alongside the company's own. */
export const PRICED_COMPETITORS = 2;

export class Analyst extends BaseAgent {
  constructor(deps: AgentDeps) {
    super('analyst', deps);
  }

  async analyzeCompetition(company: string, profile: string, competitors: string[]): Promise<string> {
    return this.generate(competitiveAnalysisPrompt(company, profile, competitors));
  }

  async swot(company: string, profile: string, competitiveAnalysis: string): Promise<SwotAnalysis> {
    const answer = await this.generate(swotPrompt(company, profile, competitiveAnalysis));
    const swot = parseSwot(answer);
    const missing = missingSwotParts(swot);
    if (missing.length > 0) {
      throw new GenerationError(`SWOT answer has no ${missing.join(', ')}`);
    }
    return swot;
  }

  async pricing(company: string, competitors: string[]): Promise<string> {
    const own = await this.pricingEvidence(company);
    const peers: PricingEvidence[] = [];
    for (const competitor of competitors.slice(0, PRICED_COMPETITORS)) {
      peers.push(await this.pricingEvidence(competitor));
    }
    return this.generate(pricingPrompt(own, peers));
  }

  private async pricingEvidence(company: string): Promise<PricingEvidence> {
    const results = await this.search.search(`${company} pricing plans cost`, { limit: PRICING_RESULTS });
    return { company, results };
  }
}
