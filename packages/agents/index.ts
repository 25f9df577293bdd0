// Competitive intelligence: research pipelines with session memory
// Runs a fixed six-step analysis per company and compares 2-5 companies.

export { CompanyPipeline, TRANSITIONS, PIPELINE_STEPS, completeAnalysis } from './orchestrator/company-pipeline.js';
export type {
  CompanyPipelineDeps, PipelineRunOptions, Transition, TransitionContext, TransitionOutput,
} from './orchestrator/company-pipeline.js';
export {
  ComparisonOrchestrator, validateCompanies, MIN_COMPANIES, MAX_COMPANIES, MAX_CONCURRENCY,
} from './orchestrator/comparison-orchestrator.js';
export type {
  ComparisonOptions, ComparisonOrchestratorDeps, ComparisonProgress,
} from './orchestrator/comparison-orchestrator.js';
export { StepRunner, summarizeResult } from './orchestrator/step-runner.js';
export type { StepRunnerOptions, StepOperation } from './orchestrator/step-runner.js';

export * from './agents/index.js';

export { MemoryManager, SessionBuffer, FileSessionStore, InMemorySessionStore } from './memory/index.js';
export type { MemoryManagerOptions, SessionStore, CreateSessionOptions } from './memory/index.js';

// Session backend factory: selects file or in-memory store from COMPINTEL_SESSION_BACKEND
export * from './config/index.js';

export * from './types/index.js';

// Bridge: concrete search, generation, page and export adapters
export * from './bridge/index.js';

export * from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel, formatLogLine } from './utils/logger.js';
export type { Logger, LogLevel, LogSink } from './utils/logger.js';
export { evaluateReport, evaluateCharts } from './utils/report-evaluator.js';
export type { ReportEvaluation, ChartEvaluation, ReportMetrics } from './utils/report-evaluator.js';
export {
  buildComparisonReport, buildChartData, determineWinner, rankByScore, formatScoreTable,
  formatScore, leadingCategories,
} from './utils/comparative-reporter.js';
export { parseCompetitorList, parseSwot, parseScorecards } from './utils/analysis-parsers.js';
export { generateSessionId, isValidSessionId, reportFilename, comparisonFilename } from './utils/naming.js';
