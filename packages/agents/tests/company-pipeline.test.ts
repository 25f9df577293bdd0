import { describe, it, expect, beforeEach } from 'vitest';
import { CompanyPipeline, PIPELINE_STEPS, TRANSITIONS } from '../orchestrator/company-pipeline.js';
import { MemoryManager } from '../memory/memory-manager.js';
import { InMemorySessionStore } from '../memory/session-store.js';
import { SimpleEventBus } from '../types/events.js';
import type { CompanyAnalysisOutcome } from '../types/analysis.js';
import { PipelineError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
  CannedSearch,
  RecordingExporter,
  ScriptedGenerator,
  fixedClock,
} from './helpers/fakes.js';

const quiet = createLogger('test', () => {});
const REPORT_FILE = 'Acme_competitive_analysis_20250304_050607.md';

function failedOf(outcome: CompanyAnalysisOutcome) {
  if (outcome.status !== 'failed') throw new Error(`expected a failed outcome, got ${outcome.status}`);
  return outcome;
}

function completedOf(outcome: CompanyAnalysisOutcome) {
  if (outcome.status !== 'completed') throw new Error(`expected a completed outcome, got ${outcome.status}`);
  return outcome;
}

describe('CompanyPipeline', () => {
  let store: InMemorySessionStore;
  let memory: MemoryManager;
  let search: CannedSearch;
  let exporter: RecordingExporter;

  beforeEach(async () => {
    store = new InMemorySessionStore();
    memory = await MemoryManager.open(store, 's1', { clock: fixedClock });
    search = new CannedSearch();
    exporter = new RecordingExporter();
  });

  function pipeline(generator: ScriptedGenerator, extra: { eventBus?: SimpleEventBus } = {}) {
    return new CompanyPipeline({
      search,
      generator,
      reportExporter: exporter,
      clock: fixedClock,
      logger: quiet,
      ...extra,
    });
  }

  it('declares the six steps in order', () => {
    expect(PIPELINE_STEPS.map(s => TRANSITIONS[s].stepName)).toEqual([
      'Company Research',
      'Competitor Discovery',
      'Competitive Analysis',
      'SWOT Analysis',
      'Pricing Analysis',
      'Report Compilation',
    ]);
    expect(PIPELINE_STEPS.map(s => TRANSITIONS[s].stepIndex)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  describe('full run', () => {
    it('produces a complete analysis and exports the report', async () => {
      const generator = new ScriptedGenerator();
      const outcome = completedOf(await pipeline(generator).run('Acme', memory));

      expect(outcome.company).toBe('Acme');
      expect(outcome.reportFilename).toBe(REPORT_FILE);
      expect(outcome.reportPath).toBe(`/reports/${REPORT_FILE}`);
      expect(outcome.result.competitors).toEqual(['Alpha Tools', 'Beta Works', 'Gamma Labs', 'Delta Apps']);
      expect(outcome.result.swot).toEqual({
        strengths: ['Simple onboarding', 'Fast sync'],
        weaknesses: ['Limited reporting'],
        opportunities: ['Enterprise tier'],
        threats: ['Bundled office suites'],
      });
      expect(outcome.result.pricingStrategy).toBe('Mid-tier pricing at 10 dollars per seat.');
      expect(exporter.exported.get(REPORT_FILE)).toBe(outcome.result.report);
      expect(generator.kinds()).toEqual([
        'research', 'competitors', 'competitiveAnalysis', 'swot', 'pricing', 'report',
      ]);
    });

    it('records fourteen messages and counts the analysis', async () => {
      await pipeline(new ScriptedGenerator()).run('Acme', memory);

      const history = memory.history();
      expect(history).toHaveLength(14);
      expect(history[0].content).toBe('Analyze Acme');
      expect(history[0].role).toBe('user');
      expect(history.filter(m => m.content.startsWith('Completed '))).toHaveLength(6);
      expect(history[13].content).toBe(`Report saved: ${REPORT_FILE}`);
      expect(history[13].metadata).toEqual({ company: 'Acme', path: `/reports/${REPORT_FILE}` });

      const stats = memory.statistics();
      expect(stats.analysisCount).toBe(1);
      expect(memory.snapshot().data.companyName).toBe('Acme');
      expect(memory.snapshot().data.reportFilename).toBe(REPORT_FILE);
      expect((await store.load('s1')).history).toHaveLength(14);
    });

    it('summarizes competitor and SWOT steps in the history', async () => {
      await pipeline(new ScriptedGenerator()).run('Acme', memory);

      const summaries = memory.history()
        .filter(m => m.metadata.status === 'completed')
        .map(m => m.metadata.summary);
      expect(summaries[1]).toBe('Alpha Tools, Beta Works, Gamma Labs, Delta Apps');
      expect(summaries[3]).toBe('2 strengths, 1 weaknesses, 1 opportunities, 1 threats');
      expect(summaries[5]).toBe(`exported to /reports/${REPORT_FILE}`);
    });

    it('searches overview, competitors and pricing for two competitors', async () => {
      await pipeline(new ScriptedGenerator()).run('Acme', memory);

      expect(search.queries).toEqual([
        { query: 'Acme company overview products services', limit: 3 },
        { query: 'Acme competitors alternatives similar companies', limit: 5 },
        { query: 'Acme pricing plans cost', limit: 3 },
        { query: 'Alpha Tools pricing plans cost', limit: 3 },
        { query: 'Beta Works pricing plans cost', limit: 3 },
      ]);
    });

    it('drops the company itself from its competitor list', async () => {
      const outcome = completedOf(await pipeline(new ScriptedGenerator()).run('Alpha Tools', memory));
      expect(outcome.result.competitors).toEqual(['Beta Works', 'Gamma Labs', 'Delta Apps']);
    });

    it('publishes CompanyAnalysisCompleted', async () => {
      const bus = new SimpleEventBus();
      const payloads: unknown[] = [];
      bus.on('CompanyAnalysisCompleted', e => payloads.push(e.payload));

      await pipeline(new ScriptedGenerator(), { eventBus: bus }).run('Acme', memory);

      expect(payloads).toHaveLength(1);
      expect(payloads[0]).toMatchObject({ company: 'Acme', reportFilename: REPORT_FILE });
    });
  });

  describe('failures', () => {
    it('stops at SWOT and keeps the first three results', async () => {
      const generator = new ScriptedGenerator({ swot: 'Nothing useful here.' });
      const outcome = failedOf(await pipeline(generator).run('Acme', memory));

      expect(outcome.failedState).toBe('swot');
      expect(outcome.stepName).toBe('SWOT Analysis');
      expect(outcome.reason).toBe('SWOT answer has no strengths, weaknesses, opportunities, threats');
      expect(Object.keys(outcome.partial).sort()).toEqual(
        ['company', 'competitiveAnalysis', 'competitors', 'profile'],
      );
      expect(generator.kinds()).toEqual(['research', 'competitors', 'competitiveAnalysis', 'swot']);

      const history = memory.history();
      expect(history).toHaveLength(9);
      expect(history[8].content).toBe(
        'Failed SWOT Analysis: SWOT answer has no strengths, weaknesses, opportunities, threats',
      );
      expect(memory.statistics().analysisCount).toBe(0);
      expect((await store.load('s1')).history).toHaveLength(9);
    });

    it('fails competitor discovery with fewer than three competitors', async () => {
      const generator = new ScriptedGenerator({ competitors: '1. Alpha Tools - planning' });
      const outcome = failedOf(await pipeline(generator).run('Acme', memory));

      expect(outcome.stepName).toBe('Competitor Discovery');
      expect(outcome.reason).toBe('Found only 1 competitor for Acme (need at least 3)');
    });

    it('reports search errors as step failures', async () => {
      search = new CannedSearch(q => q.includes('competitors'));
      const outcome = failedOf(await pipeline(new ScriptedGenerator()).run('Acme', memory));

      expect(outcome.stepName).toBe('Competitor Discovery');
      expect(outcome.reason).toBe('Search: Quota or rate limit exceeded');
      expect(outcome.partial.profile).toBe('Makes collaborative planning software for small teams.');
    });

    it('fails report compilation when the export fails', async () => {
      exporter = new RecordingExporter(new Error('disk full'));
      const outcome = failedOf(await pipeline(new ScriptedGenerator()).run('Acme', memory));

      expect(outcome.failedState).toBe('report-compilation');
      expect(outcome.reason).toBe('disk full');
      expect(outcome.partial.pricingStrategy).toBe('Mid-tier pricing at 10 dollars per seat.');
    });

    it('fails on an empty generated answer', async () => {
      const outcome = failedOf(await pipeline(new ScriptedGenerator({ research: '   ' })).run('Acme', memory));
      expect(outcome.reason).toBe('Empty response from generation service (researcher)');
    });

    it('rejects an empty company name before recording anything', async () => {
      await expect(pipeline(new ScriptedGenerator()).run('   ', memory)).rejects.toBeInstanceOf(ValidationError);
      expect(memory.history()).toEqual([]);
    });
  });

  describe('resume', () => {
    it('continues from the failed state with the partial result', async () => {
      const failed = failedOf(await pipeline(new ScriptedGenerator({ swot: 'nothing' })).run('Acme', memory));

      const generator = new ScriptedGenerator();
      const outcome = completedOf(await pipeline(generator).run('Acme', memory, {
        resumeFrom: failed.failedState,
        partial: failed.partial,
      }));

      expect(generator.kinds()).toEqual(['swot', 'pricing', 'report']);
      expect(outcome.result.profile).toBe(failed.partial.profile);
      expect(memory.history()).toHaveLength(9 + 8);
      expect(memory.history()[9].metadata).toEqual({ company: 'Acme', resumeFrom: 'swot' });
      expect(memory.statistics().analysisCount).toBe(1);
    });

    it('refuses to resume when an earlier result is missing', async () => {
      await expect(
        pipeline(new ScriptedGenerator()).run('Acme', memory, {
          resumeFrom: 'pricing',
          partial: { company: 'Acme', profile: 'p' },
        }),
      ).rejects.toThrow('Cannot resume at Pricing Analysis: "competitors" from Competitor Discovery is missing');
    });
  });

  describe('runTransition', () => {
    it('runs one transition and names the next state', async () => {
      const p = pipeline(new ScriptedGenerator());
      const out = await p.runTransition('research', {
        company: 'Acme',
        result: { company: 'Acme' },
        runner: p.createRunner(memory, 'Acme'),
        reportFilename: REPORT_FILE,
      });

      expect(out.next).toBe('competitor-discovery');
      expect(out.result.profile).toBe('Makes collaborative planning software for small teams.');
      expect(memory.history().map(m => m.content)).toEqual(['Starting Company Research', 'Completed Company Research']);
    });

    it('throws PipelineError without recording when an input is missing', async () => {
      const p = pipeline(new ScriptedGenerator());
      const attempt = p.runTransition('swot', {
        company: 'Acme',
        result: { company: 'Acme' },
        runner: p.createRunner(memory, 'Acme'),
        reportFilename: REPORT_FILE,
      });

      await expect(attempt).rejects.toBeInstanceOf(PipelineError);
      await expect(attempt).rejects.toThrow('Cannot run SWOT Analysis: "profile" has not been produced yet');
      expect(memory.history()).toEqual([]);
    });
  });
});
