export { BaseAgent, AGENT_TYPES, type AgentType, type AgentDeps } from './base-agent.js';
export { Researcher, type ResearcherDeps } from './researcher.js';
export { Analyst } from './analyst.js';
export { ReportWriter, type ReportWriterDeps, type CompiledReport } from './report-writer.js';
export { ComparisonAnalyst, type ScoringOutcome } from './comparison-analyst.js';
export { PROMPT_HEADINGS, promptKind, type PromptKind } from './prompts.js';
