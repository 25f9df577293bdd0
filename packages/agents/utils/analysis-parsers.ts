// Turn generated text into the structured pieces the pipeline keeps:
// competitor names, SWOT lists and comparison scorecards.

import { z } from 'zod';
import {
  SCORE_CATEGORIES,
  scoreRecord,
  type ScoreCategory,
  type Scorecard,
  type SwotAnalysis,
} from '../types/analysis.js';

export const MIN_COMPETITORS = 3;
export const MAX_COMPETITORS = 5;

const LIST_ITEM = /^\s*(?:\d+[.)]|[-*•])\s+(.*)$/;

function stripMarkdown(text: string): string {
  return text.replace(/\*\*|__|`/g, '').trim().replace(/^#+\s*/, '').trim();
}

/**
 * Extract competitor names from a numbered or bulleted list. Only top-level
 * items count; the name is whatever precedes the first separator
 * (" - ", ":", " – ", " (").
 */
export function parseCompetitorList(text: string): string[] {
  const names: string[] = [];
  const seen = new Set<string>();

  for (const line of text.split('\n')) {
    if (/^\s{2,}/.test(line)) continue;   // nested detail lines
    const match = LIST_ITEM.exec(line);
    if (!match) continue;

    const item = stripMarkdown(match[1]);
    const name = item.split(/\s+[-–—]\s+|:|\s\(/)[0].trim();
    if (!name) continue;

    const key = name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    names.push(name);
  }

  return names.slice(0, MAX_COMPETITORS);
}

// ── SWOT ────────────────────────────────────────────────────────────

const SWOT_HEADINGS: Array<[keyof SwotAnalysis, RegExp]> = [
  ['strengths', /^strengths?\b/i],
  ['weaknesses', /^weakness(?:es)?\b/i],
  ['opportunities', /^opportunit(?:y|ies)\b/i],
  ['threats', /^threats?\b/i],
];

function matchHeading(line: string): { key: keyof SwotAnalysis; rest: string } | null {
  const cleaned = stripMarkdown(line).replace(/^\d+[.)]\s*/, '');
  for (const [key, pattern] of SWOT_HEADINGS) {
    const m = pattern.exec(cleaned);
    if (!m) continue;
    // "Strengths", "Strengths (internal)", "Strengths: inline item"
    const tail = /^\s*(?:\([^)]*\))?\s*(?::\s*(.*))?$/.exec(cleaned.slice(m[0].length));
    if (tail) return { key, rest: (tail[1] ?? '').trim() };
  }
  return null;
}

/**
 * Split a SWOT write-up into its four lists. Items are bullet/numbered lines
 * under each heading; inline text after "Strengths:" counts as an item.
 */
export function parseSwot(text: string): SwotAnalysis {
  const swot: Record<keyof SwotAnalysis, string[]> = {
    strengths: [],
    weaknesses: [],
    opportunities: [],
    threats: [],
  };
  let current: keyof SwotAnalysis | null = null;

  for (const line of text.split('\n')) {
    if (!line.trim()) continue;

    const heading = matchHeading(line);
    if (heading) {
      current = heading.key;
      if (heading.rest) swot[current].push(heading.rest);
      continue;
    }

    if (!current) continue;
    const item = LIST_ITEM.exec(line);
    if (item) {
      const value = stripMarkdown(item[1]);
      if (value) swot[current].push(value);
    }
  }

  return swot;
}

export function missingSwotParts(swot: SwotAnalysis): Array<keyof SwotAnalysis> {
  return SWOT_HEADINGS.map(([key]) => key).filter(key => swot[key].length === 0);
}

// ── Scorecards ──────────────────────────────────────────────────────

/** Remove ```json fences a model may wrap around its answer. */
export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*/gi, '').replace(/```/g, '').trim();
}

const RawScoresSchema = z.record(z.record(z.coerce.number()));

export const NEUTRAL_SCORE = 5;

function clampScore(n: number): number {
  if (!Number.isFinite(n)) return NEUTRAL_SCORE;
  return Math.min(10, Math.max(1, Math.round(n)));
}

export function averageScore(scores: Record<ScoreCategory, number>): number {
  const total = SCORE_CATEGORIES.reduce((sum, c) => sum + scores[c], 0);
  return Math.round((total / SCORE_CATEGORIES.length) * 100) / 100;
}

export function buildScorecard(company: string, scores: Record<ScoreCategory, number>): Scorecard {
  return { company, scores, average: averageScore(scores) };
}

export function neutralScorecards(companies: string[]): Scorecard[] {
  return companies.map(company => buildScorecard(company, scoreRecord(() => NEUTRAL_SCORE)));
}

export type ScoreParseResult =
  | { ok: true; scorecards: Scorecard[] }
  | { ok: false; reason: string };

/**
 * Parse `{ "<Company>": { "<Category>": n, ... }, ... }`. Company and
 * category keys match case-insensitively; every company needs every category.
 */
export function parseScorecards(text: string, companies: string[]): ScoreParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFences(text));
  } catch {
    return { ok: false, reason: 'response is not valid JSON' };
  }

  const parsed = RawScoresSchema.safeParse(raw);
  if (!parsed.success) return { ok: false, reason: 'unexpected score structure' };

  const byCompany = new Map(
    Object.entries(parsed.data).map(([name, scores]) => [name.trim().toLowerCase(), scores]),
  );

  const scorecards: Scorecard[] = [];
  for (const company of companies) {
    const entry = byCompany.get(company.trim().toLowerCase());
    if (!entry) return { ok: false, reason: `no scores for ${company}` };

    const byCategory = new Map(
      Object.entries(entry).map(([k, v]) => [k.trim().toLowerCase(), v]),
    );
    const missing = SCORE_CATEGORIES.find(c => !byCategory.has(c.toLowerCase()));
    if (missing) return { ok: false, reason: `no "${missing}" score for ${company}` };

    const scores = scoreRecord(c => clampScore(byCategory.get(c.toLowerCase()) ?? NEUTRAL_SCORE));
    scorecards.push(buildScorecard(company, scores));
  }

  return { ok: true, scorecards };
}
