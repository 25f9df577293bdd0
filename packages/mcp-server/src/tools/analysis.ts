import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import {
  CompanyPipeline,
  ComparisonOrchestrator,
  MemoryManager,
  evaluateCharts,
  evaluateReport,
  rankByScore,
  type ComparisonOrchestratorDeps,
  type FailedCompanyAnalysis,
  type SessionStore,
} from "@competitive-intel/agents";
import {
  AnalyzeCompanySchema,
  CompareCompaniesSchema,
  GetSessionSchema,
  type AnalyzeCompanyInput,
  type CompareCompaniesInput,
  type GetSessionInput,
} from "../schemas/analysis.js";
import { wrapResponse, type ToolResponse } from "../formatters/response.js";

export interface CollaboratorRequest {
  memory: MemoryManager;
  fetchPages?: boolean;
}

export interface AnalysisToolRuntime {
  store: SessionStore;
  /** Collaborators for one run; token usage should be credited to `memory`. */
  collaborators(request: CollaboratorRequest): ComparisonOrchestratorDeps;
  defaultConcurrency?: number;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Present when the latest save failed; the run's results are still returned. */
function persistWarning(memory: MemoryManager): { persist_warning?: string } {
  const error = memory.persistError;
  return error ? { persist_warning: `Session not saved: ${error.message}` } : {};
}

async function openMemory(runtime: AnalysisToolRuntime, sessionId?: string): Promise<MemoryManager> {
  return sessionId
    ? MemoryManager.restore(runtime.store, sessionId)
    : MemoryManager.open(runtime.store);
}

export async function analyzeCompany(
  runtime: AnalysisToolRuntime,
  input: AnalyzeCompanyInput,
): Promise<ToolResponse> {
  try {
    const memory = await openMemory(runtime, input.session_id);
    const pipeline = new CompanyPipeline(
      runtime.collaborators({ memory, fetchPages: input.fetch_pages }),
    );
    const outcome = await pipeline.run(input.company, memory);

    if (outcome.status === "failed") {
      return {
        content: [{
          type: "text" as const,
          text: JSON.stringify({
            error: outcome.reason,
            step: outcome.stepName,
            company: outcome.company,
            session_id: memory.sessionId,
            completed_fields: Object.keys(outcome.partial).filter(k => k !== "company"),
            ...persistWarning(memory),
          }),
        }],
        isError: true,
      };
    }

    const evaluation = evaluateReport(outcome.result.report);
    return wrapResponse({
      session_id: memory.sessionId,
      company: outcome.company,
      competitors: outcome.result.competitors,
      report_filename: outcome.reportFilename,
      report_path: outcome.reportPath ?? null,
      duration_ms: outcome.durationMs,
      evaluation: {
        overall: evaluation.overallScore,
        completeness: evaluation.completenessScore,
        quality: evaluation.qualityScore,
        recommendations: evaluation.recommendations,
      },
      statistics: memory.statistics(),
      ...persistWarning(memory),
      report: outcome.result.report,
    });
  } catch (err) {
    return wrapResponse(asError(err));
  }
}

export async function compareCompanies(
  runtime: AnalysisToolRuntime,
  input: CompareCompaniesInput,
): Promise<ToolResponse> {
  try {
    const memory = await openMemory(runtime, input.session_id);
    const orchestrator = new ComparisonOrchestrator(
      runtime.collaborators({ memory, fetchPages: input.fetch_pages }),
    );
    const run = await orchestrator.compare(input.companies, memory, {
      concurrency: input.concurrency ?? runtime.defaultConcurrency ?? 1,
    });
    const { comparison } = run;

    return wrapResponse({
      session_id: memory.sessionId,
      companies: comparison.companies,
      winner: comparison.winner.company,
      justification: comparison.winner.justification,
      ranking: rankByScore(comparison.scorecards).map(r => ({
        rank: r.rank,
        company: r.company,
        average: r.average,
      })),
      scores_estimated: comparison.scoresEstimated,
      charts: evaluateCharts(comparison.charts),
      missing_charts: comparison.missingCharts,
      failed_companies: run.outcomes
        .filter((o): o is FailedCompanyAnalysis => o.status === "failed")
        .map(o => ({ company: o.company, step: o.stepName, reason: o.reason })),
      report_path: run.reportPath ?? null,
      total_duration_ms: run.totalDurationMs,
      statistics: memory.statistics(),
      ...persistWarning(memory),
    });
  } catch (err) {
    return wrapResponse(asError(err));
  }
}

export async function getSession(
  runtime: AnalysisToolRuntime,
  input: GetSessionInput,
): Promise<ToolResponse> {
  try {
    const memory = await MemoryManager.restore(runtime.store, input.session_id);
    return wrapResponse({
      statistics: memory.statistics(),
      recent: memory.recentContext(input.recent),
    });
  } catch (err) {
    return wrapResponse(asError(err));
  }
}

export async function listSessions(runtime: AnalysisToolRuntime): Promise<ToolResponse> {
  try {
    return wrapResponse({ sessions: await runtime.store.list() });
  } catch (err) {
    return wrapResponse(asError(err));
  }
}

export function registerAnalysisTools(server: McpServer, runtime: AnalysisToolRuntime) {
  server.tool(
    "analyze_company",
    "Run the six-step competitive analysis for one company: web research, competitor discovery, competitive analysis, SWOT, pricing and a Markdown report. Every step is recorded in a persisted session. Returns the report, its file path, discovered competitors and a report quality evaluation, or the failing step and reason.",
    AnalyzeCompanySchema.shape,
    async (params) => {
      const validated = AnalyzeCompanySchema.parse(params);
      return analyzeCompany(runtime, validated);
    }
  );

  server.tool(
    "compare_companies",
    "Analyze 2-5 companies and compare them: narrative comparison, 1-10 scores in eight categories, a winner with justification, radar/bar/heatmap chart data and a comparison report. Companies that fail are reported and skipped; at least two must succeed.",
    CompareCompaniesSchema.shape,
    async (params) => {
      const validated = CompareCompaniesSchema.parse(params);
      return compareCompanies(runtime, validated);
    }
  );

  server.tool(
    "get_session",
    "Show a saved session: message count, analyses completed, tokens used and the most recent messages.",
    GetSessionSchema.shape,
    async (params) => {
      const validated = GetSessionSchema.parse(params);
      return getSession(runtime, validated);
    }
  );

  server.tool(
    "list_sessions",
    "List the ids of all saved sessions.",
    async () => listSessions(runtime)
  );
}
