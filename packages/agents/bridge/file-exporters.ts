// File-backed export collaborators: Markdown reports and JSON chart payloads

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { ChartArtifact, ChartData } from '../types/analysis.js';
import type { ChartRenderer, ReportExporter } from '../types/collaborators.js';
import { chartFilename } from '../utils/naming.js';

export class MarkdownReportExporter implements ReportExporter {
  constructor(private readonly outputDir: string) {}

  async exportReport(filename: string, content: string): Promise<string> {
    await mkdir(this.outputDir, { recursive: true });
    const path = resolve(join(this.outputDir, filename));
    await writeFile(path, content.endsWith('\n') ? content : `${content}\n`, 'utf-8');
    return path;
  }
}

/**
 * Writes each chart's data payload as JSON for an external plotting tool.
 */
export class JsonChartRenderer implements ChartRenderer {
  constructor(
    private readonly outputDir: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async render(data: ChartData, companies: string[]): Promise<ChartArtifact> {
    await mkdir(this.outputDir, { recursive: true });
    const path = resolve(join(this.outputDir, chartFilename(data.chartType, companies, this.clock())));
    await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    return { chartType: data.chartType, data, path };
  }
}
