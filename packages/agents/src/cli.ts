#!/usr/bin/env node
// compintel: competitive-intelligence CLI
//
// Usage:
//   compintel analyze Notion                         # single-company report
//   compintel compare Notion Coda "Microsoft Loop"   # 2-5 company comparison
//   compintel session <id>                           # show a saved session
//   compintel sessions                               # list saved sessions
//   compintel menu                                   # interactive menu
//   compintel --help                                 # usage

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { loadSettings, type Settings } from '../config/settings.js';
import { createCollaborators, createSessionStore, openRunSession } from '../config/runtime.js';
import { MemoryManager } from '../memory/memory-manager.js';
import type { SessionStore } from '../memory/session-store.js';
import { CompanyPipeline } from '../orchestrator/company-pipeline.js';
import { ComparisonOrchestrator } from '../orchestrator/comparison-orchestrator.js';
import { SimpleEventBus, type DomainEvent } from '../types/events.js';
import type { ComparisonRun } from '../types/analysis.js';
import { evaluateCharts, evaluateReport } from '../utils/report-evaluator.js';
import { InsufficientDataError, StepFailure, describeError } from '../utils/errors.js';
import { formatScore } from '../utils/comparative-reporter.js';
import { setLogLevel } from '../utils/logger.js';
import { parseCliArgs, type CliArgs } from './cli-args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

function payloadField(event: DomainEvent, key: string): string {
  const payload = event.payload;
  if (typeof payload !== 'object' || payload === null || !(key in payload)) return '';
  const value: unknown = Reflect.get(payload, key);
  return String(value);
}

// ── CLI class ───────────────────────────────────────────────────────

class CompIntelCli {
  private readonly settings: Settings;
  private readonly store: SessionStore;
  private readonly eventBus = new SimpleEventBus();

  constructor() {
    this.settings = loadSettings();
    setLogLevel(this.settings.logLevel);
    this.store = createSessionStore(this.settings);
    this.wireProgress();
  }

  async start(argv: string[]): Promise<void> {
    const args = parseCliArgs(argv);

    if (args.help || args.command === 'help') {
      this.printHelp();
      return;
    }

    switch (args.command) {
      case 'analyze': {
        const company = args.positionals.join(' ').trim();
        if (!company) {
          console.error('Error: No company provided. Use "compintel --help" for usage.\n');
          process.exit(1);
        }
        const ok = await this.runAnalysis(company, args);
        if (!ok) process.exit(1);
        break;
      }
      case 'compare': {
        const ok = await this.runComparison(args.positionals, args);
        if (!ok) process.exit(1);
        break;
      }
      case 'session':
        await this.showSession(args.positionals[0]);
        break;
      case 'sessions':
        await this.listSessions();
        break;
      case 'menu':
        await this.startMenu(args);
        break;
    }
  }

  // ── Progress ────────────────────────────────────────────────────

  private wireProgress(): void {
    const line = (text: string) => process.stderr.write(`  ${text}\n`);
    const scope = (e: DomainEvent) => {
      const company = payloadField(e, 'company');
      return company ? c('magenta', `[${company}]`) : c('magenta', '[comparison]');
    };

    this.eventBus.on('StepStarted', e =>
      line(`${scope(e)} ${c('dim', `${payloadField(e, 'step')}. ${payloadField(e, 'stepName')}...`)}`));
    this.eventBus.on('StepCompleted', e =>
      line(`${scope(e)} ${c('green', '✓')} ${payloadField(e, 'stepName')} ${c('dim', `(${payloadField(e, 'durationMs')}ms)`)}`));
    this.eventBus.on('StepFailed', e =>
      line(`${scope(e)} ${c('red', '✗')} ${payloadField(e, 'stepName')}: ${payloadField(e, 'error')}`));
    this.eventBus.on('ChartSkipped', e =>
      line(`${c('yellow', 'Chart skipped:')} ${payloadField(e, 'chartType')} (${payloadField(e, 'reason')})`));
    this.eventBus.on('PersistFailed', e =>
      line(`${c('yellow', 'Warning:')} session not saved: ${payloadField(e, 'error')}`));
  }

  private async openMemory(sessionId?: string): Promise<MemoryManager> {
    const memory = await openRunSession(this.settings, this.store, sessionId, { eventBus: this.eventBus });
    const label = sessionId ? `Continuing session ${memory.sessionId}` : `Session ${memory.sessionId}`;
    console.log(`  ${c('dim', label)}`);
    return memory;
  }

  private runtime(memory: MemoryManager, args: CliArgs) {
    return createCollaborators(
      { ...this.settings, fetchPages: this.settings.fetchPages && args.fetchPages },
      {
        eventBus: this.eventBus,
        onUsage: usage => memory.addTokensUsed(usage.inputTokens + usage.outputTokens),
      },
    );
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async runAnalysis(company: string, args: CliArgs, session?: MemoryManager): Promise<boolean> {
    console.log(`\n  ${c('bold', 'Competitive Intelligence')} ${c('dim', `: ${company}`)}`);
    console.log(`  ${c('dim', `Model: ${this.settings.model}`)}\n`);

    const memory = session ?? await this.openMemory(args.sessionId);
    const pipeline = new CompanyPipeline(this.runtime(memory, args));
    const outcome = await pipeline.run(company, memory);

    if (outcome.status === 'failed') {
      console.error(`\n  ${c('red', 'Failed')} at ${c('bold', outcome.stepName)}: ${outcome.reason}`);
      this.printStats(memory);
      return false;
    }

    const evaluation = evaluateReport(outcome.result.report);
    const duration = (outcome.durationMs / 1000).toFixed(1);
    console.log(`\n  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `in ${duration}s`)}`);
    console.log(`  Report: ${c('cyan', outcome.reportPath ?? outcome.reportFilename)}`);
    console.log(`  Competitors: ${outcome.result.competitors.join(', ')}`);
    console.log(`  Quality score: ${c('bold', `${evaluation.overallScore}/100`)} ${c('dim', `(completeness ${evaluation.completenessScore}, quality ${evaluation.qualityScore})`)}`);
    for (const tip of evaluation.recommendations) {
      console.log(`    ${c('dim', '●')} ${tip}`);
    }
    this.printStats(memory);
    return true;
  }

  // ── Subcommand: compare ─────────────────────────────────────────

  private async runComparison(companies: string[], args: CliArgs, session?: MemoryManager): Promise<boolean> {
    console.log(`\n  ${c('bold', 'Competitive Comparison')} ${c('dim', `: ${companies.join(' vs ')}`)}\n`);

    const memory = session ?? await this.openMemory(args.sessionId);
    const orchestrator = new ComparisonOrchestrator(this.runtime(memory, args));

    let run: ComparisonRun;
    try {
      run = await orchestrator.compare(companies, memory, {
        concurrency: args.concurrency ?? this.settings.concurrency,
        onProgress: p => {
          if (p.status === 'running') return;
          const mark = p.status === 'completed' ? c('green', '✓') : c('red', '✗');
          process.stderr.write(`  ${mark} ${p.current} ${c('dim', `(${p.completed}/${p.total})`)}${p.error ? ` ${p.error}` : ''}\n`);
        },
      });
    } catch (err) {
      if (err instanceof InsufficientDataError || err instanceof StepFailure) {
        console.error(`\n  ${c('red', 'Comparison failed:')} ${err.message}`);
        this.printStats(memory);
        return false;
      }
      throw err;
    }

    const { comparison } = run;
    console.log(`\n  ${c('green', '✓')} ${c('bold', `Winner: ${comparison.winner.company}`)} ${c('dim', `(${formatScore(comparison.winner.average)}/10)`)}`);
    for (const entry of comparison.winner.ranking) {
      console.log(`    ${entry.rank}. ${entry.company} ${c('dim', `${formatScore(entry.average)}/10`)}`);
    }
    if (comparison.scoresEstimated) {
      console.log(`  ${c('yellow', 'Scores are neutral estimates.')}`);
    }
    if (run.reportPath) console.log(`  Report: ${c('cyan', run.reportPath)}`);

    const charts = evaluateCharts(comparison.charts);
    console.log(`  Charts: ${charts.chartsGenerated}/${charts.expectedCharts}${charts.missing.length > 0 ? c('yellow', ` (missing: ${charts.missing.join(', ')})`) : ''}`);

    for (const outcome of run.outcomes) {
      if (outcome.status === 'failed') {
        console.log(`  ${c('red', '✗')} ${outcome.company} failed at ${outcome.stepName}: ${outcome.reason}`);
      }
    }
    this.printStats(memory);
    return true;
  }

  // ── Subcommands: session / sessions ─────────────────────────────

  private async showSession(sessionId: string | undefined): Promise<void> {
    if (!sessionId) {
      console.error('Error: No session id provided. Use "compintel sessions" to list them.\n');
      process.exit(1);
    }
    const memory = await MemoryManager.restore(this.store, sessionId);
    this.printStats(memory);
    console.log();
    for (const msg of memory.recentContext(10)) {
      console.log(`    ${c('dim', msg.timestamp)} ${c('cyan', `[${msg.role}]`)} ${msg.content}`);
    }
    console.log();
  }

  private async listSessions(): Promise<void> {
    const ids = await this.store.list();
    console.log(`\n  ${c('bold', `${ids.length} saved session${ids.length === 1 ? '' : 's'}`)}\n`);
    for (const id of ids) {
      console.log(`    ${c('cyan', id)}`);
    }
    console.log();
  }

  private printStats(memory: MemoryManager): void {
    const stats = memory.statistics();
    console.log(`\n  ${c('bold', 'Session')} ${c('cyan', stats.sessionId)}`);
    console.log(`  ${c('dim', `Messages: ${stats.messageCount} | Analyses: ${stats.analysisCount} | Tokens: ${stats.totalTokensUsed} | Updated: ${stats.lastUpdated}`)}`);
    if (memory.persistError) {
      console.log(`  ${c('yellow', 'Warning:')} latest save failed: ${memory.persistError.message}`);
    }
  }

  // ── Interactive menu ────────────────────────────────────────────

  private async startMenu(args: CliArgs): Promise<void> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    // One session for everything done from the menu
    const memory = await this.openMemory(args.sessionId);

    try {
      for (;;) {
        console.log(`
  ${c('bold', 'Competitive Intelligence')}
    1) Analyze a company
    2) Compare companies
    3) Exit
`);
        const choice = (await rl.question(`${c('cyan', 'compintel>')} `)).trim();

        try {
          if (choice === '1') {
            const company = (await rl.question('  Company name: ')).trim();
            if (company) await this.runAnalysis(company, args, memory);
          } else if (choice === '2') {
            const raw = await rl.question('  Companies (comma separated, 2-5): ');
            const companies = raw.split(',').map(s => s.trim()).filter(Boolean);
            await this.runComparison(companies, args, memory);
          } else if (choice === '3' || choice === 'exit' || choice === 'quit') {
            console.log(`  ${c('dim', 'Goodbye.')}\n`);
            return;
          } else {
            console.log(`  ${c('yellow', 'Choose 1, 2 or 3.')}`);
          }
        } catch (err) {
          console.error(`  ${c('red', 'Error:')} ${describeError(err)}\n`);
        }
      }
    } finally {
      rl.close();
    }
  }

  // ── Help ────────────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'compintel')}: competitive intelligence reports

  ${c('bold', 'Usage:')}
    compintel analyze <company>           Research one company and write its report
    compintel compare <A> <B> [...]       Compare 2-5 companies
    compintel session <id>                Show a saved session
    compintel sessions                    List saved sessions
    compintel menu                        Interactive menu
    compintel --help                      Show this help

  ${c('bold', 'Options:')}
    --session <id>                        Continue an existing session
    --concurrency <n>                     Companies analyzed at once (compare, max 5)
    --no-pages                            Skip fetching result pages during research

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY                     Required. Anthropic API key.
    SERPAPI_KEY                           Required. SerpAPI key.
    COMPINTEL_MODEL                       Model override.
    COMPINTEL_OUTPUT_DIR                  Where reports and charts are written.
    COMPINTEL_SESSION_DIR                 Where sessions are saved.
    COMPINTEL_STEP_TIMEOUT_MS             Per-step timeout (0 disables).

  ${c('bold', 'Examples:')}
    compintel analyze Notion
    compintel compare Notion Coda "Microsoft Loop" --concurrency 3
    compintel analyze Figma --session session_20250101_120000_1a2b3c4d
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const cli = new CompIntelCli();
  await cli.start(process.argv.slice(2));
}

main().catch((err) => {
  const step = err instanceof StepFailure ? ` (step: ${err.stepName})` : '';
  console.error(`${c('red', 'Fatal:')} ${describeError(err)}${step}`);
  process.exit(1);
});
