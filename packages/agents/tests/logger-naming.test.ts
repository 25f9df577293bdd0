import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, formatLogLine, getLogLevel, setLogLevel } from '../utils/logger.js';
import {
  chartFilename,
  comparisonFilename,
  formatTimestamp,
  generateSessionId,
  isValidSessionId,
  reportFilename,
  toFileSegment,
} from '../utils/naming.js';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('formats scoped lines with optional data', () => {
    expect(formatLogLine('Pipeline', 'warn', 'Step failed')).toBe('[Pipeline:WARN] Step failed');
    expect(formatLogLine('Pipeline', 'info', 'Done', { company: 'Acme' })).toBe('[Pipeline:INFO] Done {"company":"Acme"}');
  });

  it('drops lines below the threshold', () => {
    const lines: string[] = [];
    const log = createLogger('Test', line => lines.push(line));

    log.debug('hidden');
    log.info('shown');
    setLogLevel('error');
    log.warn('hidden too');
    log.error('bad');

    expect(getLogLevel()).toBe('error');
    expect(lines).toEqual(['[Test:INFO] shown', '[Test:ERROR] bad']);
  });

  it('nests child scopes', () => {
    const lines: string[] = [];
    createLogger('Agent', line => lines.push(line)).child('researcher').info('hi');
    expect(lines).toEqual(['[Agent.researcher:INFO] hi']);
  });
});

describe('naming', () => {
  const at = new Date('2025-12-31T23:59:58Z');

  it('formats UTC timestamps', () => {
    expect(formatTimestamp(at)).toBe('20251231_235958');
  });

  it('generates session ids that are valid file names', () => {
    const id = generateSessionId(at);
    expect(id).toMatch(/^session_20251231_235958_[0-9a-f]{8}$/);
    expect(isValidSessionId(id)).toBe(true);
    expect(generateSessionId(at)).not.toBe(id);
  });

  it('rejects unsafe session ids', () => {
    expect(isValidSessionId('..')).toBe(false);
    expect(isValidSessionId('a/b')).toBe(false);
    expect(isValidSessionId('')).toBe(false);
  });

  it('builds report, comparison and chart file names', () => {
    expect(toFileSegment(' Microsoft Loop! ')).toBe('Microsoft_Loop');
    expect(toFileSegment('///')).toBe('company');
    expect(reportFilename('Microsoft Loop', at)).toBe('Microsoft_Loop_competitive_analysis_20251231_235958.md');
    expect(comparisonFilename(['Notion', 'Coda'], at)).toBe('comparison_Notion_vs_Coda_20251231_235958.md');
    expect(chartFilename('radar', ['Notion', 'Coda'], at)).toBe('chart_radar_Notion_vs_Coda_20251231_235958.json');
  });
});
