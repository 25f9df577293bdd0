// Comparison analyst: cross-company narrative and 1-10 scorecards.

import type { CompleteCompanyAnalysis, Scorecard } from '../types/analysis.js';
import { neutralScorecards, parseScorecards } from '../utils/analysis-parsers.js';
import { BaseAgent, type AgentDeps } from './base-agent.js';
import { comparisonPrompt, scoringPrompt } from './prompts.js';

export interface ScoringOutcome {
  scorecards: Scorecard[];
  /** True when the answer was unreadable and neutral scores were used. */
  estimated: boolean;
}

export class ComparisonAnalyst extends BaseAgent {
  constructor(deps: AgentDeps) {
    super('comparison-analyst', deps);
  }

  async narrative(analyses: CompleteCompanyAnalysis[]): Promise<string> {
    return this.generate(comparisonPrompt(analyses));
  }

  async score(analyses: CompleteCompanyAnalysis[], narrative: string): Promise<ScoringOutcome> {
    const companies = analyses.map(a => a.company);
    const answer = await this.generate(scoringPrompt(analyses, narrative));
    const parsed = parseScorecards(answer, companies);
    if (parsed.ok) return { scorecards: parsed.scorecards, estimated: false };

    this.log.warn('Falling back to neutral scores', { reason: parsed.reason });
    return { scorecards: neutralScorecards(companies), estimated: true };
  }
}
