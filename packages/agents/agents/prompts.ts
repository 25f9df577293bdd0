// Prompt builders for the generation collaborator
// The first line of every prompt is its heading, so logs and test doubles
// can tell prompts apart without parsing the body.

import { SCORE_CATEGORIES, type CompleteCompanyAnalysis, type SwotAnalysis } from '../types/analysis.js';
import type { SearchResult } from '../types/collaborators.js';

export const PROMPT_HEADINGS = {
  research: '## Company Research',
  competitors: '## Competitor Discovery',
  competitiveAnalysis: '## Competitive Analysis',
  swot: '## SWOT Analysis',
  pricing: '## Pricing Analysis',
  report: '## Report Compilation',
  comparison: '## Comparison Narrative',
  scoring: '## Comparison Scoring',
} as const;

export type PromptKind = keyof typeof PROMPT_HEADINGS;

/** Which prompt a text is, by its first line. */
export function promptKind(prompt: string): PromptKind | undefined {
  const heading = prompt.split('\n', 1)[0].trim();
  return Object.keys(PROMPT_HEADINGS)
    .filter(isPromptKind)
    .find(kind => PROMPT_HEADINGS[kind] === heading);
}

function isPromptKind(value: string): value is PromptKind {
  return value in PROMPT_HEADINGS;
}

const PAGE_EXCERPT_CHARS = 1000;

export interface PageExcerpt {
  url: string;
  content: string;
}

export function formatSearchResults(results: SearchResult[]): string {
  if (results.length === 0) return 'No search results.';
  return results
    .map((r, i) => `${i + 1}. ${r.title}\n   ${r.snippet}\n   URL: ${r.url}`)
    .join('\n');
}

export function formatPages(pages: PageExcerpt[]): string {
  if (pages.length === 0) return 'No page content.';
  return pages
    .map((p, i) => {
      const body = p.content.length > PAGE_EXCERPT_CHARS
        ? `${p.content.slice(0, PAGE_EXCERPT_CHARS)}...`
        : p.content;
      return `Source ${i + 1} (${p.url}):\n${body}`;
    })
    .join('\n\n');
}

export function formatSwot(swot: SwotAnalysis): string {
  const part = (title: string, items: string[]) =>
    [`**${title}:**`, ...items.map(i => `- ${i}`)].join('\n');
  return [
    part('Strengths', swot.strengths),
    part('Weaknesses', swot.weaknesses),
    part('Opportunities', swot.opportunities),
    part('Threats', swot.threats),
  ].join('\n\n');
}

export function researchPrompt(company: string, results: SearchResult[], pages: PageExcerpt[]): string {
  return [
    PROMPT_HEADINGS.research,
    `Based on the following search results and web content about ${company}, extract key information.`,
    '',
    'Search Results:',
    formatSearchResults(results),
    '',
    'Web Content:',
    formatPages(pages),
    '',
    'Provide a structured summary with:',
    '1. Company Overview (what they do, their mission)',
    '2. Main Products/Services',
    '3. Target Market',
    '4. Key Features/Differentiators',
    '',
    'Keep it concise and factual.',
  ].join('\n');
}

export function competitorPrompt(company: string, results: SearchResult[]): string {
  return [
    PROMPT_HEADINGS.competitors,
    `Based on these search results about ${company}'s competitors:`,
    '',
    formatSearchResults(results),
    '',
    'Identify the top 3-5 main competitors.',
    'Answer with a numbered list, one competitor per line, formatted as:',
    '1. <Company name> - <why they compete>',
  ].join('\n');
}

export function competitiveAnalysisPrompt(company: string, profile: string, competitors: string[]): string {
  return [
    PROMPT_HEADINGS.competitiveAnalysis,
    'You are a business analyst. Perform a competitive analysis based on this data:',
    '',
    `TARGET COMPANY: ${company}`,
    profile,
    '',
    'COMPETITORS:',
    ...competitors.map((c, i) => `${i + 1}. ${c}`),
    '',
    'Cover:',
    `1. **Market Position**: Where does ${company} stand relative to competitors?`,
    `2. **Competitive Advantages**: What are ${company}'s unique strengths?`,
    '3. **Competitive Disadvantages**: Where do competitors have an edge?',
    '4. **Feature Comparison**: Compare key features/offerings across competitors',
    '5. **Target Audience Overlap**: How similar are the target markets?',
    '',
    'Be specific and data-driven. Use the information provided.',
  ].join('\n');
}

export function swotPrompt(company: string, profile: string, competitiveAnalysis: string): string {
  return [
    PROMPT_HEADINGS.swot,
    `Based on this information about ${company}:`,
    '',
    'COMPANY OVERVIEW:',
    profile,
    '',
    'COMPETITIVE ANALYSIS:',
    competitiveAnalysis,
    '',
    'Generate a SWOT analysis using exactly these headings, each followed by a bulleted list:',
    '',
    '**Strengths:**',
    '- 4-5 key strengths',
    '',
    '**Weaknesses:**',
    '- 4-5 key weaknesses',
    '',
    '**Opportunities:**',
    '- 4-5 market opportunities',
    '',
    '**Threats:**',
    '- 4-5 threats from competition or the market',
  ].join('\n');
}

export interface PricingEvidence {
  company: string;
  results: SearchResult[];
}

export function pricingPrompt(own: PricingEvidence, competitors: PricingEvidence[]): string {
  return [
    PROMPT_HEADINGS.pricing,
    'Analyze the pricing strategy based on this data:',
    '',
    `${own.company} Pricing:`,
    formatSearchResults(own.results),
    '',
    'Competitor Pricing:',
    ...(competitors.length > 0
      ? competitors.map(c => `${c.company}:\n${formatSearchResults(c.results)}`)
      : ['No competitor pricing found.']),
    '',
    'Provide:',
    '1. Pricing positioning (premium/mid-tier/budget)',
    '2. Comparison with competitors',
    '3. Pricing strategy recommendations',
    '',
    'Keep it concise.',
  ].join('\n');
}

export function reportPrompt(analysis: Omit<CompleteCompanyAnalysis, 'report'>, generatedOn: string): string {
  return [
    PROMPT_HEADINGS.report,
    'You are a business intelligence analyst. Generate a competitive analysis report in Markdown.',
    '',
    'COMPANY RESEARCH:',
    analysis.profile,
    '',
    'IDENTIFIED COMPETITORS:',
    analysis.competitors.join(', '),
    '',
    'COMPETITIVE ANALYSIS:',
    analysis.competitiveAnalysis,
    '',
    'SWOT ANALYSIS:',
    formatSwot(analysis.swot),
    '',
    'PRICING ANALYSIS:',
    analysis.pricingStrategy,
    '',
    'Use these sections:',
    `# Competitive Analysis Report: ${analysis.company}`,
    `*Generated on ${generatedOn}*`,
    '## Executive Summary',
    '## 1. Company Overview',
    '## 2. Competitive Landscape',
    '## 3. Competitive Analysis',
    '## 4. SWOT Analysis',
    '## 5. Pricing Strategy Analysis',
    '## 6. Strategic Recommendations',
    '## 7. Conclusion',
  ].join('\n');
}

function companyDigest(analysis: CompleteCompanyAnalysis): string {
  return [
    `### ${analysis.company}`,
    analysis.profile,
    '',
    `Competitors: ${analysis.competitors.join(', ')}`,
    '',
    formatSwot(analysis.swot),
    '',
    'Pricing:',
    analysis.pricingStrategy,
  ].join('\n');
}

export function comparisonPrompt(analyses: CompleteCompanyAnalysis[]): string {
  const names = analyses.map(a => a.company);
  return [
    PROMPT_HEADINGS.comparison,
    `Compare these companies head-to-head: ${names.join(', ')}.`,
    '',
    ...analyses.map(companyDigest),
    '',
    'Cover market position, product offering, competitive advantages and weaknesses,',
    'pricing and SWOT differences, then give a final verdict naming the strongest company.',
  ].join('\n');
}

export function scoringPrompt(analyses: CompleteCompanyAnalysis[], narrative: string): string {
  const example = Object.fromEntries(SCORE_CATEGORIES.map(c => [c, 7]));
  return [
    PROMPT_HEADINGS.scoring,
    `Companies: ${analyses.map(a => a.company).join(', ')}`,
    `Score each company from 1 to 10 in every category: ${SCORE_CATEGORIES.join(', ')}.`,
    '',
    'COMPARISON:',
    narrative,
    '',
    'Answer with JSON only, keyed by company name, for example:',
    JSON.stringify({ [analyses[0]?.company ?? 'Company']: example }),
  ].join('\n');
}
