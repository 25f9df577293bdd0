import { describe, it, expect } from 'vitest';
import { evaluateCharts, evaluateReport } from '../utils/report-evaluator.js';
import { buildChartData } from '../utils/comparative-reporter.js';
import { buildScorecard } from '../utils/analysis-parsers.js';
import { scoreRecord } from '../types/analysis.js';

const FULL_REPORT = [
  '# Competitive Analysis Report: Acme',
  '## Executive Summary',
  'Acme leads.',
  '## 1. Company Overview',
  '## 3. Competitive Analysis',
  '## 4. SWOT Analysis',
  '**Strengths**',
  '- Fast',
  '**Weaknesses**',
  '- Slow',
  '**Opportunities**',
  '- Growth',
  '**Threats**',
  '- Rivals',
  '## 5. Pricing Strategy Analysis',
  '## 6. Strategic Recommendations',
  '- Expand',
  '## 7. Conclusion',
  'Done.',
].join('\n');

describe('evaluateReport', () => {
  it('scores a short report that has every section', () => {
    const result = evaluateReport(FULL_REPORT);

    expect(result.sectionsMissing).toEqual([]);
    expect(result.sectionsFound).toHaveLength(11);
    expect(result.completenessScore).toBe(100);
    expect(result.metrics.bulletPoints).toBe(5);
    expect(result.metrics.headers).toBe(15);
    expect(result.metrics.hasAllSwotParts).toBe(true);
    // depth 10 + SWOT 25 + headers 10 + recommendations 10 + conclusion 10
    expect(result.qualityScore).toBe(65);
    expect(result.overallScore).toBe(82.5);
    expect(result.recommendations).toEqual(['Consider adding more detailed analysis']);
  });

  it('lists what a bare report is missing', () => {
    const result = evaluateReport('Just a paragraph about the company.');

    expect(result.wordCount).toBe(6);
    expect(result.charCount).toBe(35);
    expect(result.completenessScore).toBe(0);
    expect(result.qualityScore).toBe(10);
    expect(result.overallScore).toBe(5);
    expect(result.recommendations).toEqual([
      'Ensure all SWOT components are present',
      'Consider adding more detailed analysis',
      'Add strategic recommendations section',
      'Missing key sections: Executive Summary, Company Overview, Competitive Analysis',
    ]);
  });

  it('rewards length in tiers', () => {
    expect(evaluateReport('word '.repeat(999)).qualityScore).toBe(10);

    const thousand = evaluateReport('word '.repeat(1000));
    expect(thousand.wordCount).toBe(1000);
    expect(thousand.metrics.adequateLength).toBe(true);
    expect(thousand.qualityScore).toBe(15);

    expect(evaluateReport('word '.repeat(5000)).qualityScore).toBe(30);
  });

  it('gives partial SWOT credit for the heading alone', () => {
    const result = evaluateReport('## SWOT Analysis\nToo thin.');
    expect(result.metrics.hasSwot).toBe(true);
    expect(result.metrics.hasAllSwotParts).toBe(false);
    expect(result.qualityScore).toBe(25);
  });
});

describe('evaluateCharts', () => {
  it('reports the missing chart types', () => {
    const card = buildScorecard('Acme', scoreRecord(() => 5));
    const result = evaluateCharts({ radar: { chartType: 'radar', data: buildChartData('radar', [card]) } });

    expect(result).toEqual({
      chartsGenerated: 1,
      expectedCharts: 3,
      allChartsPresent: false,
      missing: ['bar', 'heatmap'],
      score: 33.33,
    });
  });
});
