// Report writer: compiles the final report and hands it to the exporter.

import type { CompleteCompanyAnalysis } from '../types/analysis.js';
import type { ReportExporter } from '../types/collaborators.js';
import { BaseAgent, type AgentDeps } from './base-agent.js';
import { reportPrompt } from './prompts.js';

export interface ReportWriterDeps extends AgentDeps {
  exporter?: ReportExporter;
}

export interface CompiledReport {
  report: string;
  /** Where the exporter wrote it, when one is configured. */
  path?: string;
}

export class ReportWriter extends BaseAgent {
  private readonly exporter?: ReportExporter;

  constructor(deps: ReportWriterDeps) {
    super('report-writer', deps);
    this.exporter = deps.exporter;
  }

  async compile(
    analysis: Omit<CompleteCompanyAnalysis, 'report'>,
    filename: string,
    generatedAt: Date,
  ): Promise<CompiledReport> {
    const generatedOn = generatedAt.toISOString().slice(0, 10);
    const report = await this.generate(reportPrompt(analysis, generatedOn));
    if (!this.exporter) return { report };

    const path = await this.exporter.exportReport(filename, report);
    this.log.info(`Report written: ${path}`, { company: analysis.company });
    return { report, path };
  }
}
