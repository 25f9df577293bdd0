// File and id naming helpers. Timestamps are UTC so names are stable
// regardless of the host timezone.

import { randomUUID } from 'node:crypto';

const pad = (n: number): string => n.toString().padStart(2, '0');

/** YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function generateSessionId(now: Date = new Date()): string {
  return `session_${formatTimestamp(now)}_${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

const SESSION_ID_PATTERN = /^[A-Za-z0-9_.-]+$/;

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_PATTERN.test(sessionId) && sessionId !== '.' && sessionId !== '..';
}

/** Collapse anything that is unsafe in a file name to underscores. */
export function toFileSegment(name: string): string {
  return name.trim().replace(/[^A-Za-z0-9.-]+/g, '_').replace(/^_+|_+$/g, '') || 'company';
}

export function reportFilename(company: string, at: Date): string {
  return `${toFileSegment(company)}_competitive_analysis_${formatTimestamp(at)}.md`;
}

export function comparisonFilename(companies: string[], at: Date): string {
  return `comparison_${companies.map(toFileSegment).join('_vs_')}_${formatTimestamp(at)}.md`;
}

export function chartFilename(chartType: string, companies: string[], at: Date): string {
  return `chart_${chartType}_${companies.map(toFileSegment).join('_vs_')}_${formatTimestamp(at)}.json`;
}
