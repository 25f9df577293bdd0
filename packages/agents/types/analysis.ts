// Company analysis & multi-company comparison aggregates

export interface SwotAnalysis {
  readonly strengths: string[];
  readonly weaknesses: string[];
  readonly opportunities: string[];
  readonly threats: string[];
}

/**
 * Accumulates as the pipeline advances. Fields of steps that never ran (or
 * failed) stay undefined.
 */
export interface CompanyAnalysisResult {
  company: string;
  profile?: string;
  competitors?: string[];
  competitiveAnalysis?: string;
  swot?: SwotAnalysis;
  pricingStrategy?: string;
  report?: string;
}

export type CompleteCompanyAnalysis = Required<CompanyAnalysisResult>;

export const PIPELINE_STATES = [
  'research',
  'competitor-discovery',
  'competitive-analysis',
  'swot',
  'pricing',
  'report-compilation',
  'done',
] as const;

export type PipelineState = typeof PIPELINE_STATES[number];
export type PipelineStep = Exclude<PipelineState, 'done'>;

export interface CompletedCompanyAnalysis {
  status: 'completed';
  company: string;
  result: CompleteCompanyAnalysis;
  reportFilename: string;
  reportPath?: string;
  durationMs: number;
}

export interface FailedCompanyAnalysis {
  status: 'failed';
  company: string;
  partial: CompanyAnalysisResult;
  failedState: PipelineStep;
  stepName: string;
  reason: string;
  error: Error;
  durationMs: number;
}

export type CompanyAnalysisOutcome = CompletedCompanyAnalysis | FailedCompanyAnalysis;

// ── Comparison ──────────────────────────────────────────────────────

export const SCORE_CATEGORIES = [
  'Market Position',
  'Product Quality',
  'Innovation',
  'Pricing Value',
  'Customer Satisfaction',
  'Growth Potential',
  'Brand Strength',
  'Technology Stack',
] as const;

export type ScoreCategory = typeof SCORE_CATEGORIES[number];

export interface Scorecard {
  company: string;
  scores: Record<ScoreCategory, number>;   // 1-10
  average: number;
}

export interface RankedCompany {
  company: string;
  average: number;
  rank: number;
}

export interface WinnerDetermination {
  company: string;
  average: number;
  justification: string;
  ranking: RankedCompany[];
}

export const CHART_TYPES = ['radar', 'bar', 'heatmap'] as const;
export type ChartType = typeof CHART_TYPES[number];

export interface ChartSeries {
  label: string;
  values: number[];
}

/** Per-chart-type payload handed to the rendering collaborator. */
export interface ChartData {
  chartType: ChartType;
  title: string;
  categories: string[];
  series: ChartSeries[];
}

export interface ChartArtifact {
  chartType: ChartType;
  data: ChartData;
  path?: string;
}

export interface MissingChart {
  chartType: ChartType;
  reason: string;
}

export interface ComparisonResult {
  companies: string[];
  narrative: string;
  winner: WinnerDetermination;
  scorecards: Scorecard[];
  scoresEstimated: boolean;
  charts: Partial<Record<ChartType, ChartArtifact>>;
  missingCharts: MissingChart[];
  report: string;
  generatedAt: string;
}

export interface ComparisonRun {
  comparison: ComparisonResult;
  outcomes: CompanyAnalysisOutcome[];
  reportPath?: string;
  totalDurationMs: number;
}

/** Build a full category→score record from a per-category function. */
export function scoreRecord(score: (category: ScoreCategory) => number): Record<ScoreCategory, number> {
  return {
    'Market Position': score('Market Position'),
    'Product Quality': score('Product Quality'),
    'Innovation': score('Innovation'),
    'Pricing Value': score('Pricing Value'),
    'Customer Satisfaction': score('Customer Satisfaction'),
    'Growth Potential': score('Growth Potential'),
    'Brand Strength': score('Brand Strength'),
    'Technology Stack': score('Technology Stack'),
  };
}
