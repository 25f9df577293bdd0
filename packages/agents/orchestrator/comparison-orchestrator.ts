// Multi-company comparison
// Runs the single-company pipeline for 2-5 companies in batches with
// concurrency control, then one aggregation step and one step per chart.
// A company failure never aborts the others; a chart failure never aborts
// the comparison.

import {
  CHART_TYPES,
  type ChartArtifact,
  type ChartType,
  type CompanyAnalysisOutcome,
  type CompletedCompanyAnalysis,
  type ComparisonResult,
  type ComparisonRun,
  type FailedCompanyAnalysis,
  type MissingChart,
} from '../types/analysis.js';
import type { ChartRenderer } from '../types/collaborators.js';
import { publish } from '../types/events.js';
import type { MemoryManager } from '../memory/memory-manager.js';
import { ComparisonAnalyst } from '../agents/comparison-analyst.js';
import { CompanyPipeline, type CompanyPipelineDeps } from './company-pipeline.js';
import { StepRunner } from './step-runner.js';
import {
  buildChartData,
  buildComparisonReport,
  determineWinner,
} from '../utils/comparative-reporter.js';
import {
  InsufficientDataError,
  StepFailure,
  ValidationError,
  describeError,
  type CompanyFailureSummary,
} from '../utils/errors.js';
import { comparisonFilename } from '../utils/naming.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const MIN_COMPANIES = 2;
export const MAX_COMPANIES = 5;
export const MAX_CONCURRENCY = 5;
/** Successful analyses needed before comparing. */
export const MIN_SUCCESSFUL = 2;

const AGGREGATION_STEP = { stepName: 'Comparison Analysis', stepIndex: 7, agent: 'comparison-analyst' } as const;

const CHART_STEP_NAMES: Record<ChartType, string> = {
  radar: 'Radar Chart',
  bar: 'Bar Chart',
  heatmap: 'Heatmap Chart',
};

export interface ComparisonProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface ComparisonOptions {
  /** Companies analyzed at once (default: 1, max: 5) */
  concurrency?: number;
  onProgress?: (progress: ComparisonProgress) => void;
}

export interface ComparisonOrchestratorDeps extends CompanyPipelineDeps {
  chartRenderer?: ChartRenderer;
}

/** Trimmed, non-empty, case-insensitively distinct, 2-5 names. */
export function validateCompanies(companies: string[]): string[] {
  const names = companies.map(c => c.trim());
  if (names.some(n => n.length === 0)) {
    throw new ValidationError('Company names must not be empty');
  }
  if (names.length < MIN_COMPANIES || names.length > MAX_COMPANIES) {
    throw new ValidationError(
      `Compare between ${MIN_COMPANIES} and ${MAX_COMPANIES} companies (got ${names.length})`,
    );
  }
  const seen = new Set<string>();
  for (const name of names) {
    const key = name.toLowerCase();
    if (seen.has(key)) throw new ValidationError(`Company listed twice: ${name}`);
    seen.add(key);
  }
  return names;
}

function failureSummary(outcome: FailedCompanyAnalysis): CompanyFailureSummary {
  return { company: outcome.company, stepName: outcome.stepName, reason: outcome.reason };
}

export class ComparisonOrchestrator {
  private readonly pipeline: CompanyPipeline;
  private readonly comparisonAnalyst: ComparisonAnalyst;
  private readonly deps: ComparisonOrchestratorDeps;
  private readonly clock: () => Date;
  private readonly log: Logger;

  constructor(deps: ComparisonOrchestratorDeps) {
    this.deps = deps;
    this.log = deps.logger ?? createLogger('Comparison');
    this.clock = deps.clock ?? (() => new Date());
    this.pipeline = new CompanyPipeline({ ...deps, logger: deps.logger ?? createLogger('Pipeline') });
    this.comparisonAnalyst = new ComparisonAnalyst({
      search: deps.search,
      generator: deps.generator,
      logger: this.log,
    });
  }

  async compare(
    companies: string[],
    memory: MemoryManager,
    options: ComparisonOptions = {},
  ): Promise<ComparisonRun> {
    const names = validateCompanies(companies);
    const concurrency = Math.min(MAX_CONCURRENCY, Math.max(1, Math.floor(options.concurrency ?? 1)));
    const totalStart = Date.now();

    memory.record('user', `Compare ${names.join(', ')}`, { companies: names, concurrency });
    this.log.info(`Comparing ${names.join(', ')}`, { concurrency });

    const outcomes = await this.analyzeAll(names, memory, concurrency, options.onProgress);

    const successes = outcomes.filter((o): o is CompletedCompanyAnalysis => o.status === 'completed');
    const failures = outcomes.filter((o): o is FailedCompanyAnalysis => o.status === 'failed');
    const failureSummaries = failures.map(failureSummary);

    if (successes.length < MIN_SUCCESSFUL) {
      const error = new InsufficientDataError(successes.length, MIN_SUCCESSFUL, failureSummaries);
      memory.record('system', `Comparison aborted: ${error.message}`, {
        companies: names,
        successful: successes.length,
      });
      await memory.persist();
      throw error;
    }

    const compared = successes.map(s => s.company);
    const runner = new StepRunner(memory, {
      timeoutMs: this.deps.stepTimeoutMs ?? 0,
      persistAfterStep: this.deps.persistAfterStep ?? true,
      tags: { companies: compared },
      eventBus: this.deps.eventBus,
      logger: this.log,
    });

    // Aggregation
    const analyses = successes.map(s => s.result);
    const aggregate = await runner.run(
      AGGREGATION_STEP.stepName,
      AGGREGATION_STEP.stepIndex,
      AGGREGATION_STEP.agent,
      async () => {
        const narrative = await this.comparisonAnalyst.narrative(analyses);
        const scoring = await this.comparisonAnalyst.score(analyses, narrative);
        return { narrative, ...scoring };
      },
      a => `${a.scorecards.length} scorecards${a.estimated ? ' (estimated)' : ''}`,
    );
    const winner = determineWinner(aggregate.scorecards, aggregate.estimated);

    // Charts
    const charts: Partial<Record<ChartType, ChartArtifact>> = {};
    const missingCharts: MissingChart[] = [];
    for (const [offset, chartType] of CHART_TYPES.entries()) {
      try {
        charts[chartType] = await runner.run(
          CHART_STEP_NAMES[chartType],
          AGGREGATION_STEP.stepIndex + 1 + offset,
          'chart-designer',
          () => this.renderChart(chartType, aggregate.scorecards, compared),
          a => a.path ?? a.data.title,
        );
      } catch (err) {
        if (!(err instanceof StepFailure)) throw err;
        missingCharts.push({ chartType, reason: err.reason });
        publish(this.deps.eventBus, 'ChartSkipped', 'ComparisonOrchestrator', {
          chartType, reason: err.reason,
        });
      }
    }

    const at = this.clock();
    const generatedAt = at.toISOString();
    const report = buildComparisonReport({
      companies: compared,
      narrative: aggregate.narrative,
      scorecards: aggregate.scorecards,
      winner,
      scoresEstimated: aggregate.estimated,
      charts,
      missingCharts,
      failures: failureSummaries,
      generatedAt,
    });

    const comparison: ComparisonResult = {
      companies: compared,
      narrative: aggregate.narrative,
      winner,
      scorecards: aggregate.scorecards,
      scoresEstimated: aggregate.estimated,
      charts,
      missingCharts,
      report,
      generatedAt,
    };

    const reportPath = await this.exportReport(memory, comparisonFilename(compared, at), report);

    memory.record('assistant', `Comparison complete: ${winner.company} ranks first`, {
      companies: compared,
      winner: winner.company,
      missingCharts: missingCharts.map(m => m.chartType),
      ...(reportPath ? { path: reportPath } : {}),
    });
    await memory.persist();

    const totalDurationMs = Date.now() - totalStart;
    publish(this.deps.eventBus, 'ComparisonCompleted', 'ComparisonOrchestrator', {
      companies: compared,
      winner: winner.company,
      failed: failures.map(f => f.company),
      totalDurationMs,
    });

    return {
      comparison,
      outcomes,
      ...(reportPath ? { reportPath } : {}),
      totalDurationMs,
    };
  }

  /**
   * Per-company pipelines in batches. With concurrency above one each
   * pipeline records into its own buffer, merged when that company finishes.
   */
  private async analyzeAll(
    names: string[],
    memory: MemoryManager,
    concurrency: number,
    onProgress?: (progress: ComparisonProgress) => void,
  ): Promise<CompanyAnalysisOutcome[]> {
    const outcomes: CompanyAnalysisOutcome[] = [];
    let finished = 0;

    for (let i = 0; i < names.length; i += concurrency) {
      const batch = names.slice(i, i + concurrency);

      const batchPromises = batch.map(async (company): Promise<CompanyAnalysisOutcome> => {
        onProgress?.({
          completed: finished,
          total: names.length,
          current: company,
          status: 'running',
        });

        let outcome: CompanyAnalysisOutcome;
        if (concurrency === 1) {
          outcome = await this.pipeline.run(company, memory);
        } else {
          const buffer = memory.fork();
          try {
            outcome = await this.pipeline.run(company, buffer);
          } finally {
            memory.merge(buffer);
          }
          await memory.persist();
        }

        onProgress?.({
          completed: ++finished,
          total: names.length,
          current: company,
          status: outcome.status,
          ...(outcome.status === 'failed' ? { error: `${outcome.stepName}: ${outcome.reason}` } : {}),
        });
        return outcome;
      });

      const batchResults = await Promise.all(batchPromises);
      outcomes.push(...batchResults);
    }

    return outcomes;
  }

  private async renderChart(
    chartType: ChartType,
    scorecards: ComparisonResult['scorecards'],
    companies: string[],
  ): Promise<ChartArtifact> {
    const data = buildChartData(chartType, scorecards);
    const renderer = this.deps.chartRenderer;
    if (!renderer) return { chartType, data };
    return renderer.render(data, companies);
  }

  private async exportReport(
    memory: MemoryManager,
    filename: string,
    report: string,
  ): Promise<string | undefined> {
    const exporter = this.deps.reportExporter;
    if (!exporter) return undefined;
    try {
      return await exporter.exportReport(filename, report);
    } catch (err) {
      const reason = describeError(err);
      this.log.warn('Comparison report export failed', { filename, error: reason });
      memory.record('system', `Comparison report export failed: ${reason}`, { filename });
      return undefined;
    }
  }
}
