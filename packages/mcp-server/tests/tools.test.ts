import { describe, it, expect, beforeEach } from 'vitest';
import { GenerationError, InMemorySessionStore } from '@competitive-intel/agents';
import type { GenerationProvider, Session } from '@competitive-intel/agents';
import {
  analyzeCompany,
  compareCompanies,
  getSession,
  listSessions,
  type AnalysisToolRuntime,
} from '../src/tools/analysis.js';
import type { ToolResponse } from '../src/formatters/response.js';
import {
  CannedSearch,
  RecordingChartRenderer,
  RecordingExporter,
  ScriptedGenerator,
  failingFor,
  fixedClock,
  quietLogger,
} from '../../agents/tests/helpers/fakes.js';

const REPORT_FILE = 'Acme_competitive_analysis_20250304_050607.md';
const TOKENS_PER_CALL = 100;

/** Accepts the first save (session creation) and rejects every later one. */
class FullDiskStore extends InMemorySessionStore {
  private saves = 0;

  override async save(session: Session): Promise<void> {
    this.saves++;
    if (this.saves > 1) throw new Error('ENOSPC: no space left on device');
    return super.save(session);
  }
}

function body(response: ToolResponse): Record<string, unknown> {
  const parsed: unknown = JSON.parse(response.content[0].text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('expected a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

describe('analysis tools', () => {
  let store: InMemorySessionStore;
  let generator: GenerationProvider;
  let fetchPagesRequested: Array<boolean | undefined>;

  function runtime(): AnalysisToolRuntime {
    return {
      store,
      defaultConcurrency: 1,
      collaborators: ({ memory, fetchPages }) => {
        fetchPagesRequested.push(fetchPages);
        return {
          search: new CannedSearch(),
          generator: {
            async generate(prompt: string) {
              memory.addTokensUsed(TOKENS_PER_CALL);
              return generator.generate(prompt);
            },
          },
          reportExporter: new RecordingExporter(),
          chartRenderer: new RecordingChartRenderer(),
          clock: fixedClock,
          logger: quietLogger,
        };
      },
    };
  }

  beforeEach(() => {
    store = new InMemorySessionStore();
    generator = new ScriptedGenerator();
    fetchPagesRequested = [];
  });

  describe('analyze_company', () => {
    it('returns the report with its evaluation and session statistics', async () => {
      const response = await analyzeCompany(runtime(), { company: 'Acme', fetch_pages: false });
      const result = body(response);

      expect(response.isError).toBeUndefined();
      expect(result.session_id).toMatch(/^session_\d{8}_\d{6}_[0-9a-f]{8}$/);
      expect(result.company).toBe('Acme');
      expect(result.competitors).toEqual(['Alpha Tools', 'Beta Works', 'Gamma Labs', 'Delta Apps']);
      expect(result.report_filename).toBe(REPORT_FILE);
      expect(result.report_path).toBe(`/reports/${REPORT_FILE}`);
      expect(result.statistics).toMatchObject({ messageCount: 14, analysisCount: 1, totalTokensUsed: 600 });
      expect(fetchPagesRequested).toEqual([false]);
    });

    it('persists the session under the returned id', async () => {
      const result = body(await analyzeCompany(runtime(), { company: 'Acme' }));

      expect(await store.list()).toEqual([result.session_id]);
    });

    it('reports the failing step and the fields already produced', async () => {
      generator = new ScriptedGenerator({ swot: new GenerationError('model overloaded') });
      const response = await analyzeCompany(runtime(), { company: 'Acme' });
      const result = body(response);

      expect(response.isError).toBe(true);
      expect(result.error).toBe('model overloaded');
      expect(result.step).toBe('SWOT Analysis');
      expect(result.company).toBe('Acme');
      expect(result.completed_fields).toEqual(['profile', 'competitors', 'competitiveAnalysis']);
    });

    it('continues an existing session', async () => {
      const first = body(await analyzeCompany(runtime(), { company: 'Acme' }));
      const second = body(await analyzeCompany(runtime(), { company: 'Globex', session_id: String(first.session_id) }));

      expect(second.session_id).toBe(first.session_id);
      expect(second.statistics).toMatchObject({ messageCount: 28, analysisCount: 2 });
    });

    it('returns an error for an unknown session', async () => {
      const response = await analyzeCompany(runtime(), { company: 'Acme', session_id: 'missing' });

      expect(response.isError).toBe(true);
      expect(body(response)).toEqual({ error: 'Session "missing" not found', kind: 'NotFoundError' });
    });
  });

  describe('when the session cannot be saved', () => {
    beforeEach(() => {
      store = new FullDiskStore();
    });

    it('still returns the analysis with a warning', async () => {
      const response = await analyzeCompany(runtime(), { company: 'Acme' });
      const result = body(response);

      expect(response.isError).toBeUndefined();
      expect(result.report_filename).toBe(REPORT_FILE);
      expect(result.statistics).toMatchObject({ messageCount: 14, analysisCount: 1 });
      expect(result.persist_warning).toBe('Session not saved: ENOSPC: no space left on device');
    });

    it('adds the warning to a failed analysis', async () => {
      generator = new ScriptedGenerator({ swot: new GenerationError('model overloaded') });
      const result = body(await analyzeCompany(runtime(), { company: 'Acme' }));

      expect(result.step).toBe('SWOT Analysis');
      expect(result.persist_warning).toBe('Session not saved: ENOSPC: no space left on device');
    });

    it('still returns the comparison with a warning', async () => {
      const response = await compareCompanies(runtime(), { companies: ['Globex', 'Initech'] });
      const result = body(response);

      expect(response.isError).toBeUndefined();
      expect(result.winner).toBe('Initech');
      expect(result.persist_warning).toBe('Session not saved: ENOSPC: no space left on device');
    });
  });

  it('leaves out the warning when every save succeeds', async () => {
    const result = body(await analyzeCompany(runtime(), { company: 'Acme' }));
    expect(result).not.toHaveProperty('persist_warning');
  });

  describe('compare_companies', () => {
    it('ranks the companies and reports chart coverage', async () => {
      const result = body(await compareCompanies(runtime(), { companies: ['Globex', 'Initech'] }));

      expect(result.companies).toEqual(['Globex', 'Initech']);
      expect(result.winner).toBe('Initech');
      expect(result.ranking).toEqual([
        { rank: 1, company: 'Initech', average: 6 },
        { rank: 2, company: 'Globex', average: 5 },
      ]);
      expect(result.scores_estimated).toBe(false);
      expect(result.charts).toEqual({
        chartsGenerated: 3,
        expectedCharts: 3,
        allChartsPresent: true,
        missing: [],
        score: 100,
      });
      expect(result.missing_charts).toEqual([]);
      expect(result.failed_companies).toEqual([]);
      expect(result.report_path).toBe('/reports/comparison_Globex_vs_Initech_20250304_050607.md');
    });

    it('lists companies that failed', async () => {
      generator = failingFor('Hooli', new ScriptedGenerator());
      const result = body(await compareCompanies(runtime(), { companies: ['Globex', 'Hooli', 'Initech'] }));

      expect(result.companies).toEqual(['Globex', 'Initech']);
      expect(result.failed_companies).toEqual([
        { company: 'Hooli', step: 'Company Research', reason: 'quota exhausted for Hooli' },
      ]);
    });

    it('returns validation errors as tool errors', async () => {
      const response = await compareCompanies(runtime(), { companies: ['Acme', 'acme'] });

      expect(response.isError).toBe(true);
      expect(body(response)).toEqual({ error: 'Company listed twice: acme', kind: 'ValidationError' });
    });

    it('returns an error when fewer than two companies succeed', async () => {
      generator = failingFor('Hooli', new ScriptedGenerator());
      const response = await compareCompanies(runtime(), { companies: ['Globex', 'Hooli'] });

      expect(response.isError).toBe(true);
      expect(body(response).kind).toBe('InsufficientDataError');
    });
  });

  describe('get_session and list_sessions', () => {
    it('shows statistics and the most recent messages', async () => {
      const { session_id } = body(await analyzeCompany(runtime(), { company: 'Acme' }));
      const result = body(await getSession(runtime(), { session_id: String(session_id), recent: 2 }));

      expect(result.statistics).toMatchObject({ sessionId: session_id, messageCount: 14, analysisCount: 1 });
      expect(Array.isArray(result.recent) && result.recent.map((m: { content: string }) => m.content)).toEqual([
        'Completed Report Compilation',
        `Report saved: ${REPORT_FILE}`,
      ]);
    });

    it('lists saved sessions', async () => {
      await analyzeCompany(runtime(), { company: 'Acme' });
      await analyzeCompany(runtime(), { company: 'Globex' });

      const result = body(await listSessions(runtime()));
      expect(Array.isArray(result.sessions) && result.sessions.length).toBe(2);
    });
  });
});
