// Single-company pipeline: an explicit state machine
//   research → competitor-discovery → competitive-analysis → swot
//   → pricing → report-compilation → done
// Each transition is one StepRunner invocation. A failed transition halts
// the run at that state and the partial result is returned with it.

import type {
  CompanyAnalysisOutcome,
  CompanyAnalysisResult,
  CompleteCompanyAnalysis,
  PipelineState,
  PipelineStep,
  SwotAnalysis,
} from '../types/analysis.js';
import type {
  GenerationProvider,
  PageFetcher,
  ReportExporter,
  SearchProvider,
} from '../types/collaborators.js';
import type { SessionRecorder } from '../types/session.js';
import { publish, type EventBus } from '../types/events.js';
import type { AgentType } from '../agents/base-agent.js';
import { Researcher } from '../agents/researcher.js';
import { Analyst } from '../agents/analyst.js';
import { ReportWriter } from '../agents/report-writer.js';
import { StepRunner } from './step-runner.js';
import { PipelineError, StepFailure, ValidationError } from '../utils/errors.js';
import { reportFilename } from '../utils/naming.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface Transition {
  stepName: string;
  stepIndex: number;
  agent: AgentType;
  next: PipelineState;
  /** Fields of the result this transition fills in. */
  produces: keyof CompanyAnalysisResult;
}

export const TRANSITIONS: Readonly<Record<PipelineStep, Transition>> = {
  'research': {
    stepName: 'Company Research', stepIndex: 1, agent: 'researcher',
    next: 'competitor-discovery', produces: 'profile',
  },
  'competitor-discovery': {
    stepName: 'Competitor Discovery', stepIndex: 2, agent: 'researcher',
    next: 'competitive-analysis', produces: 'competitors',
  },
  'competitive-analysis': {
    stepName: 'Competitive Analysis', stepIndex: 3, agent: 'analyst',
    next: 'swot', produces: 'competitiveAnalysis',
  },
  'swot': {
    stepName: 'SWOT Analysis', stepIndex: 4, agent: 'analyst',
    next: 'pricing', produces: 'swot',
  },
  'pricing': {
    stepName: 'Pricing Analysis', stepIndex: 5, agent: 'analyst',
    next: 'report-compilation', produces: 'pricingStrategy',
  },
  'report-compilation': {
    stepName: 'Report Compilation', stepIndex: 6, agent: 'report-writer',
    next: 'done', produces: 'report',
  },
};

export const PIPELINE_STEPS: readonly PipelineStep[] = [
  'research',
  'competitor-discovery',
  'competitive-analysis',
  'swot',
  'pricing',
  'report-compilation',
];

export interface CompanyPipelineDeps {
  search: SearchProvider;
  generator: GenerationProvider;
  pageFetcher?: PageFetcher;
  reportExporter?: ReportExporter;
  clock?: () => Date;
  /** Per-step timeout in ms; 0 disables it. */
  stepTimeoutMs?: number;
  /** Persist after every step (default: true). */
  persistAfterStep?: boolean;
  eventBus?: EventBus;
  logger?: Logger;
}

export interface TransitionContext {
  company: string;
  result: CompanyAnalysisResult;
  runner: StepRunner;
  /** Name the report is exported under. */
  reportFilename: string;
}

export interface TransitionOutput {
  next: PipelineState;
  result: CompanyAnalysisResult;
  reportPath?: string;
}

export interface PipelineRunOptions {
  /** Restart at this state, reusing `partial` for the earlier fields. */
  resumeFrom?: PipelineStep;
  partial?: CompanyAnalysisResult;
}

function summarizeSwot(swot: SwotAnalysis): string {
  return `${swot.strengths.length} strengths, ${swot.weaknesses.length} weaknesses, ` +
    `${swot.opportunities.length} opportunities, ${swot.threats.length} threats`;
}

/** The result as a complete analysis, when every field is present. */
export function completeAnalysis(result: CompanyAnalysisResult): CompleteCompanyAnalysis | undefined {
  const { company, profile, competitors, competitiveAnalysis, swot, pricingStrategy, report } = result;
  if (
    profile === undefined || competitors === undefined || competitiveAnalysis === undefined ||
    swot === undefined || pricingStrategy === undefined || report === undefined
  ) {
    return undefined;
  }
  return { company, profile, competitors, competitiveAnalysis, swot, pricingStrategy, report };
}

export class CompanyPipeline {
  private readonly researcher: Researcher;
  private readonly analyst: Analyst;
  private readonly writer: ReportWriter;
  private readonly clock: () => Date;
  private readonly stepTimeoutMs: number;
  private readonly persistAfterStep: boolean;
  private readonly eventBus?: EventBus;
  private readonly log: Logger;

  constructor(deps: CompanyPipelineDeps) {
    this.log = deps.logger ?? createLogger('Pipeline');
    const agentDeps = { search: deps.search, generator: deps.generator, logger: this.log };
    this.researcher = new Researcher({ ...agentDeps, pageFetcher: deps.pageFetcher });
    this.analyst = new Analyst(agentDeps);
    this.writer = new ReportWriter({ ...agentDeps, exporter: deps.reportExporter });
    this.clock = deps.clock ?? (() => new Date());
    this.stepTimeoutMs = deps.stepTimeoutMs ?? 0;
    this.persistAfterStep = deps.persistAfterStep ?? true;
    this.eventBus = deps.eventBus;
  }

  /** A step runner configured like the ones `run` uses, tagged with the company. */
  createRunner(recorder: SessionRecorder, company: string): StepRunner {
    return new StepRunner(recorder, {
      timeoutMs: this.stepTimeoutMs,
      persistAfterStep: this.persistAfterStep,
      tags: { company },
      eventBus: this.eventBus,
      logger: this.log,
    });
  }

  /**
   * Run one transition. Throws PipelineError when the fields it needs are
   * missing and StepFailure when the step itself fails.
   */
  async runTransition(state: PipelineStep, ctx: TransitionContext): Promise<TransitionOutput> {
    const t = TRANSITIONS[state];
    const { company, runner } = ctx;
    const result: CompanyAnalysisResult = { ...ctx.result };
    const run = <T>(op: () => Promise<T>, summarize?: (value: T) => string) =>
      runner.run(t.stepName, t.stepIndex, t.agent, op, summarize);

    switch (state) {
      case 'research': {
        result.profile = await run(() => this.researcher.research(company));
        return { next: t.next, result };
      }
      case 'competitor-discovery': {
        result.competitors = await run(
          () => this.researcher.discoverCompetitors(company),
          names => names.join(', '),
        );
        return { next: t.next, result };
      }
      case 'competitive-analysis': {
        const profile = need(result.profile, 'profile', state);
        const competitors = need(result.competitors, 'competitors', state);
        result.competitiveAnalysis = await run(
          () => this.analyst.analyzeCompetition(company, profile, competitors),
        );
        return { next: t.next, result };
      }
      case 'swot': {
        const profile = need(result.profile, 'profile', state);
        const analysis = need(result.competitiveAnalysis, 'competitiveAnalysis', state);
        result.swot = await run(() => this.analyst.swot(company, profile, analysis), summarizeSwot);
        return { next: t.next, result };
      }
      case 'pricing': {
        const competitors = need(result.competitors, 'competitors', state);
        result.pricingStrategy = await run(() => this.analyst.pricing(company, competitors));
        return { next: t.next, result };
      }
      case 'report-compilation': {
        const input = {
          company,
          profile: need(result.profile, 'profile', state),
          competitors: need(result.competitors, 'competitors', state),
          competitiveAnalysis: need(result.competitiveAnalysis, 'competitiveAnalysis', state),
          swot: need(result.swot, 'swot', state),
          pricingStrategy: need(result.pricingStrategy, 'pricingStrategy', state),
        };
        const compiled = await run(
          () => this.writer.compile(input, ctx.reportFilename, this.clock()),
          c => c.path ? `exported to ${c.path}` : `${c.report.length} characters`,
        );
        result.report = compiled.report;
        return { next: t.next, result, reportPath: compiled.path };
      }
    }
  }

  /**
   * Drive the machine to Done (or the first failure). Failures come back as
   * a `failed` outcome; only bad input and precondition errors throw.
   */
  async run(
    companyName: string,
    recorder: SessionRecorder,
    options: PipelineRunOptions = {},
  ): Promise<CompanyAnalysisOutcome> {
    const company = companyName.trim();
    if (!company) throw new ValidationError('Company name must not be empty');

    const startState = options.resumeFrom ?? 'research';
    let result: CompanyAnalysisResult = { ...options.partial, company };
    assertResumable(startState, result);

    const started = Date.now();
    const filename = reportFilename(company, this.clock());
    const runner = this.createRunner(recorder, company);

    recorder.record('user', `Analyze ${company}`, {
      company,
      ...(options.resumeFrom ? { resumeFrom: options.resumeFrom } : {}),
    });
    this.log.info(`Analyzing ${company}`, { from: startState });

    let state: PipelineState = startState;
    let reportPath: string | undefined;
    while (state !== 'done') {
      const current: PipelineStep = state;
      try {
        const out = await this.runTransition(current, { company, result, runner, reportFilename: filename });
        result = out.result;
        reportPath = out.reportPath ?? reportPath;
        state = out.next;
      } catch (err) {
        if (!(err instanceof StepFailure)) throw err;
        return this.failed(company, result, current, err, Date.now() - started);
      }
    }

    const complete = completeAnalysis(result);
    if (!complete) {
      throw new PipelineError(`Pipeline for ${company} reached done with missing fields`, 'done');
    }

    recorder.markAnalysisComplete(company, filename);
    recorder.record('assistant', `Report saved: ${filename}`, {
      company,
      ...(reportPath ? { path: reportPath } : {}),
    });
    await recorder.persist();

    const durationMs = Date.now() - started;
    publish(this.eventBus, 'CompanyAnalysisCompleted', 'CompanyPipeline', {
      company, reportFilename: filename, durationMs,
    });
    this.log.info(`Completed ${company}`, { durationMs, reportFilename: filename });

    return {
      status: 'completed',
      company,
      result: complete,
      reportFilename: filename,
      ...(reportPath ? { reportPath } : {}),
      durationMs,
    };
  }

  private failed(
    company: string,
    partial: CompanyAnalysisResult,
    state: PipelineStep,
    failure: StepFailure,
    durationMs: number,
  ): CompanyAnalysisOutcome {
    publish(this.eventBus, 'CompanyAnalysisFailed', 'CompanyPipeline', {
      company, state, stepName: failure.stepName, error: failure.reason,
    });
    this.log.warn(`Analysis of ${company} stopped at ${failure.stepName}`, { reason: failure.reason });

    return {
      status: 'failed',
      company,
      partial,
      failedState: state,
      stepName: failure.stepName,
      reason: failure.reason,
      error: failure,
      durationMs,
    };
  }
}

function need<T>(value: T | undefined, field: keyof CompanyAnalysisResult, state: PipelineStep): T {
  if (value === undefined) {
    throw new PipelineError(
      `Cannot run ${TRANSITIONS[state].stepName}: "${field}" has not been produced yet`,
      state,
    );
  }
  return value;
}

/** Every state before `from` must already have produced its field. */
function assertResumable(from: PipelineStep, result: CompanyAnalysisResult): void {
  for (const step of PIPELINE_STEPS) {
    if (step === from) return;
    const field = TRANSITIONS[step].produces;
    if (result[field] === undefined) {
      throw new PipelineError(
        `Cannot resume at ${TRANSITIONS[from].stepName}: "${field}" from ${TRANSITIONS[step].stepName} is missing`,
        from,
      );
    }
  }
}
