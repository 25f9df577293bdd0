// Report quality heuristics
// Scores a single-company report for section coverage and depth, and a
// comparison run for chart coverage.

import { CHART_TYPES, type ChartArtifact, type ChartType } from '../types/analysis.js';

const REQUIRED_SECTIONS: ReadonlyArray<[string, RegExp]> = [
  ['Executive Summary', /executive\s+summary/i],
  ['Company Overview', /company\s+overview/i],
  ['Competitive Analysis', /competitive\s+analysis/i],
  ['SWOT Analysis', /swot\s+analysis/i],
  ['Strengths', /\*\*strengths\*\*|\bstrengths\b:/i],
  ['Weaknesses', /\*\*weaknesses\*\*|\bweaknesses\b:/i],
  ['Opportunities', /\*\*opportunities\*\*|\bopportunities\b:/i],
  ['Threats', /\*\*threats\*\*|\bthreats\b:/i],
  ['Pricing', /pricing\s+(strategy|analysis)/i],
  ['Recommendations', /recommendations?/i],
  ['Conclusion', /conclusion/i],
];

const SWOT_PARTS = ['Strengths', 'Weaknesses', 'Opportunities', 'Threats'];

export interface ReportMetrics {
  hasSwot: boolean;
  hasAllSwotParts: boolean;
  hasRecommendations: boolean;
  hasConclusion: boolean;
  adequateLength: boolean;
  comprehensiveLength: boolean;
  bulletPoints: number;
  headers: number;
}

export interface ReportEvaluation {
  wordCount: number;
  charCount: number;
  sectionsFound: string[];
  sectionsMissing: string[];
  completenessScore: number;   // 0-100
  qualityScore: number;        // 0-100
  overallScore: number;        // 0-100
  metrics: ReportMetrics;
  recommendations: string[];
}

export function evaluateReport(report: string): ReportEvaluation {
  const words = report.split(/\s+/).filter(Boolean);
  const wordCount = words.length;

  const sectionsFound: string[] = [];
  const sectionsMissing: string[] = [];
  for (const [name, pattern] of REQUIRED_SECTIONS) {
    (pattern.test(report) ? sectionsFound : sectionsMissing).push(name);
  }
  const completenessScore = round2((sectionsFound.length / REQUIRED_SECTIONS.length) * 100);

  const metrics: ReportMetrics = {
    hasSwot: sectionsFound.includes('SWOT Analysis'),
    hasAllSwotParts: SWOT_PARTS.every(p => sectionsFound.includes(p)),
    hasRecommendations: sectionsFound.includes('Recommendations'),
    hasConclusion: sectionsFound.includes('Conclusion'),
    adequateLength: wordCount >= 1000,
    comprehensiveLength: wordCount >= 3000,
    bulletPoints: countOccurrences(report, '- ') + countOccurrences(report, '* '),
    headers: countOccurrences(report, '#'),
  };

  let quality = 0;

  // Depth (10-30)
  if (wordCount >= 5000) quality += 30;
  else if (wordCount >= 3000) quality += 25;
  else if (wordCount >= 2000) quality += 20;
  else if (wordCount >= 1000) quality += 15;
  else quality += 10;

  // SWOT (0-25)
  if (metrics.hasAllSwotParts) quality += 25;
  else if (metrics.hasSwot) quality += 15;

  // Structure (0-25)
  if (metrics.bulletPoints >= 20) quality += 15;
  else if (metrics.bulletPoints >= 10) quality += 10;
  if (metrics.headers >= 8) quality += 10;
  else if (metrics.headers >= 5) quality += 5;

  // Strategic elements (0-20)
  if (metrics.hasRecommendations) quality += 10;
  if (metrics.hasConclusion) quality += 10;

  const qualityScore = Math.min(quality, 100);

  const recommendations: string[] = [];
  if (!metrics.hasAllSwotParts) recommendations.push('Ensure all SWOT components are present');
  if (wordCount < 3000) recommendations.push('Consider adding more detailed analysis');
  if (!metrics.hasRecommendations) recommendations.push('Add strategic recommendations section');
  if (sectionsMissing.length > 3) {
    recommendations.push(`Missing key sections: ${sectionsMissing.slice(0, 3).join(', ')}`);
  }

  return {
    wordCount,
    charCount: report.length,
    sectionsFound,
    sectionsMissing,
    completenessScore,
    qualityScore,
    overallScore: round2(completenessScore * 0.5 + qualityScore * 0.5),
    metrics,
    recommendations,
  };
}

export interface ChartEvaluation {
  chartsGenerated: number;
  expectedCharts: number;
  allChartsPresent: boolean;
  missing: ChartType[];
  score: number;   // 0-100
}

export function evaluateCharts(charts: Partial<Record<ChartType, ChartArtifact>>): ChartEvaluation {
  const generated = CHART_TYPES.filter(t => charts[t] !== undefined);
  const missing = CHART_TYPES.filter(t => charts[t] === undefined);

  return {
    chartsGenerated: generated.length,
    expectedCharts: CHART_TYPES.length,
    allChartsPresent: missing.length === 0,
    missing,
    score: round2((generated.length / CHART_TYPES.length) * 100),
  };
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
