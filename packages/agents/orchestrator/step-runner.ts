// Step Runner: wraps one collaborator call in start/end bookkeeping
// Every step produces exactly two messages: "Starting <step>" and either
// "Completed <step>" or "Failed <step>: <reason>". No retries here; retry
// policy belongs to the collaborator adapter.

import type { MessageMetadata, SessionRecorder } from '../types/session.js';
import { publish, type DomainEventType, type EventBus } from '../types/events.js';
import { StepFailure, StepTimeoutError, describeError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface StepRunnerOptions {
  /** Per-invocation timeout; 0 disables it. */
  timeoutMs?: number;
  /** Persist the session after each end message (default: true). */
  persistAfterStep?: boolean;
  /** Extra tags merged into every message, e.g. `{ company }`. */
  tags?: MessageMetadata;
  eventBus?: EventBus;
  logger?: Logger;
}

export type StepOperation<T> = () => Promise<T> | T;

const SUMMARY_LIMIT = 120;

/** Short human-readable summary of a step's result for the history. */
export function summarizeResult(value: unknown): string {
  if (value === undefined || value === null) return 'no result';
  if (typeof value === 'string') {
    const flat = value.replace(/\s+/g, ' ').trim();
    return flat.length > SUMMARY_LIMIT ? `${flat.slice(0, SUMMARY_LIMIT - 3)}...` : flat;
  }
  if (Array.isArray(value)) return `${value.length} item${value.length === 1 ? '' : 's'}`;
  if (typeof value === 'object') {
    const keys = Object.keys(value);
    return keys.length > 0 ? `fields: ${keys.join(', ')}` : 'empty object';
  }
  return String(value);
}

export class StepRunner {
  private readonly recorder: SessionRecorder;
  private readonly timeoutMs: number;
  private readonly persistAfterStep: boolean;
  private readonly tags: MessageMetadata;
  private readonly eventBus?: EventBus;
  private readonly log: Logger;

  constructor(recorder: SessionRecorder, options: StepRunnerOptions = {}) {
    this.recorder = recorder;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.persistAfterStep = options.persistAfterStep ?? true;
    this.tags = options.tags ?? {};
    this.eventBus = options.eventBus;
    this.log = options.logger ?? createLogger('StepRunner');
  }

  /** A runner sharing this one's settings with extra tags. */
  withTags(tags: MessageMetadata): StepRunner {
    return new StepRunner(this.recorder, {
      timeoutMs: this.timeoutMs,
      persistAfterStep: this.persistAfterStep,
      tags: { ...this.tags, ...tags },
      eventBus: this.eventBus,
      logger: this.log,
    });
  }

  async run<T>(
    stepName: string,
    stepIndex: number,
    agent: string,
    operation: StepOperation<T>,
    summarize: (result: T) => string = summarizeResult,
  ): Promise<T> {
    const tag = { ...this.tags, step: stepIndex, agent };

    this.recorder.record('system', `Starting ${stepName}`, { ...tag, status: 'started' });
    this.emit('StepStarted', { stepName, ...tag });
    this.log.debug(`Starting ${stepName}`, tag);

    const started = Date.now();
    let result: T;
    try {
      const work = Promise.resolve().then(operation);
      result = await withTimeout(work, this.timeoutMs, () => new StepTimeoutError(stepName, this.timeoutMs));
    } catch (err) {
      const failure = new StepFailure(stepName, stepIndex, agent, err);
      const durationMs = Date.now() - started;

      this.recorder.record('system', `Failed ${stepName}: ${failure.reason}`, {
        ...tag,
        status: 'failed',
        durationMs,
      });
      this.emit('StepFailed', { stepName, ...tag, error: failure.reason, durationMs });
      this.log.warn(`Step failed: ${stepName}`, { ...tag, error: describeError(err) });
      await this.checkpoint();
      throw failure;
    }

    const durationMs = Date.now() - started;
    const summary = summarize(result);
    this.recorder.record('assistant', `Completed ${stepName}`, {
      ...tag,
      status: 'completed',
      durationMs,
      summary,
    });
    this.emit('StepCompleted', { stepName, ...tag, durationMs, summary });
    this.log.debug(`Completed ${stepName}`, { ...tag, durationMs });
    await this.checkpoint();
    return result;
  }

  private async checkpoint(): Promise<void> {
    if (!this.persistAfterStep) return;
    // PersistResult is reported by the recorder itself; progress is kept either way
    await this.recorder.persist();
  }

  private emit(type: DomainEventType, payload: Record<string, unknown>): void {
    publish(this.eventBus, type, 'StepRunner', payload);
  }
}
