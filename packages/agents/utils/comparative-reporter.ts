// Comparative Reporter
// Produces cross-company score tables, rankings, chart payloads and the
// final comparison report from per-company scorecards.

import {
  CHART_TYPES,
  SCORE_CATEGORIES,
  type ChartArtifact,
  type ChartData,
  type ChartType,
  type MissingChart,
  type RankedCompany,
  type ScoreCategory,
  type Scorecard,
  type WinnerDetermination,
} from '../types/analysis.js';
import type { CompanyFailureSummary } from './errors.js';

/**
 * Rank companies by a category (or by their average when no category is
 * given). Higher is better; equal values keep input order.
 */
export function rankByScore(
  scorecards: Scorecard[],
  category?: ScoreCategory,
): RankedCompany[] {
  const valueOf = (card: Scorecard): number =>
    category ? card.scores[category] : card.average;

  return scorecards
    .map((card, index) => ({ card, index }))
    .sort((a, b) => valueOf(b.card) - valueOf(a.card) || a.index - b.index)
    .map(({ card }, i) => ({ company: card.company, average: valueOf(card), rank: i + 1 }));
}

/** Categories where `company` holds the strictly highest score. */
export function leadingCategories(scorecards: Scorecard[], company: string): ScoreCategory[] {
  const own = scorecards.find(c => c.company === company);
  if (!own) return [];
  const others = scorecards.filter(c => c !== own);

  return SCORE_CATEGORIES.filter(category =>
    others.every(other => own.scores[category] > other.scores[category]),
  );
}

/**
 * Highest average wins; a tie goes to the company listed first.
 */
export function determineWinner(
  scorecards: Scorecard[],
  scoresEstimated = false,
): WinnerDetermination {
  const ranking = rankByScore(scorecards);
  const top = ranking[0];
  if (!top) {
    throw new RangeError('Cannot determine a winner without scorecards');
  }

  const leads = leadingCategories(scorecards, top.company);
  let justification =
    `${top.company} ranks first with an average score of ${formatScore(top.average)}/10, ` +
    (leads.length > 0
      ? `leading in ${leads.join(', ')}.`
      : 'leading in no single category.');
  if (scoresEstimated) {
    justification += ' Scores are neutral estimates because the scoring answer could not be read.';
  }

  return { company: top.company, average: top.average, justification, ranking };
}

// ── Chart payloads ──────────────────────────────────────────────────

const CHART_TITLES: Record<ChartType, string> = {
  radar: 'Competitive Profile',
  bar: 'Score Comparison by Category',
  heatmap: 'Score Heatmap',
};

/**
 * Per-type payload for the chart renderer. Radar and bar charts carry one
 * series per company over the categories; the heatmap carries one row per
 * company including its average.
 */
export function buildChartData(chartType: ChartType, scorecards: Scorecard[]): ChartData {
  const companies = scorecards.map(c => c.company).join(' vs ');
  const title = `${CHART_TITLES[chartType]}: ${companies}`;

  if (chartType === 'heatmap') {
    return {
      chartType,
      title,
      categories: [...SCORE_CATEGORIES, 'Average'],
      series: scorecards.map(card => ({
        label: card.company,
        values: [...SCORE_CATEGORIES.map(c => card.scores[c]), card.average],
      })),
    };
  }

  return {
    chartType,
    title,
    categories: [...SCORE_CATEGORIES],
    series: scorecards.map(card => ({
      label: card.company,
      values: SCORE_CATEGORIES.map(c => card.scores[c]),
    })),
  };
}

// ── Markdown ────────────────────────────────────────────────────────

/**
 * Format scorecards into a markdown table, one column per company.
 */
export function formatScoreTable(scorecards: Scorecard[]): string {
  if (scorecards.length === 0) return '';

  const companies = scorecards.map(c => c.company);
  const lines: string[] = [
    `| Category | ${companies.join(' | ')} |`,
    `|----------|${companies.map(() => '--------').join('|')}|`,
  ];

  for (const category of SCORE_CATEGORIES) {
    lines.push(`| ${category} | ${scorecards.map(c => String(c.scores[category])).join(' | ')} |`);
  }
  lines.push(`| **Average** | ${scorecards.map(c => `**${formatScore(c.average)}**`).join(' | ')} |`);

  return lines.join('\n');
}

const CHART_LABELS: Record<ChartType, string> = {
  radar: 'Radar chart',
  bar: 'Bar chart',
  heatmap: 'Heatmap',
};

export interface ComparisonReportInput {
  companies: string[];
  narrative: string;
  scorecards: Scorecard[];
  winner: WinnerDetermination;
  scoresEstimated: boolean;
  charts: Partial<Record<ChartType, ChartArtifact>>;
  missingCharts: MissingChart[];
  failures: CompanyFailureSummary[];
  generatedAt: string;
}

/**
 * Build the full comparison report.
 */
export function buildComparisonReport(input: ComparisonReportInput): string {
  const lines: string[] = [
    '# Multi-Company Competitive Comparison',
    '',
    `**Companies:** ${input.companies.join(', ')}`,
    `**Generated:** ${input.generatedAt}`,
    '',
    '## Comparative Analysis',
    '',
    input.narrative.trim(),
    '',
    '## Scores',
    '',
  ];

  if (input.scoresEstimated) {
    lines.push('> Scores below are neutral estimates; the scoring answer could not be parsed.');
    lines.push('');
  }
  lines.push(formatScoreTable(input.scorecards));
  lines.push('');

  lines.push('## Ranking');
  lines.push('');
  for (const entry of input.winner.ranking) {
    lines.push(`${entry.rank}. **${entry.company}** (${formatScore(entry.average)}/10)`);
  }
  lines.push('');
  lines.push(`**Winner:** ${input.winner.company}`);
  lines.push('');
  lines.push(input.winner.justification);
  lines.push('');

  lines.push('## Charts');
  lines.push('');
  for (const chartType of CHART_TYPES) {
    const artifact = input.charts[chartType];
    if (artifact) {
      lines.push(`- ${CHART_LABELS[chartType]}: ${artifact.path ?? artifact.data.title}`);
      continue;
    }
    const missing = input.missingCharts.find(m => m.chartType === chartType);
    lines.push(`- ${CHART_LABELS[chartType]}: _Not generated_${missing ? ` (${missing.reason})` : ''}`);
  }
  lines.push('');

  if (input.failures.length > 0) {
    lines.push('## Failed Analyses');
    lines.push('');
    for (const f of input.failures) {
      lines.push(`- **${f.company}**: failed at ${f.stepName}: ${f.reason}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function formatScore(n: number): string {
  return Number.isInteger(n) ? n.toString() : n.toFixed(2);
}
