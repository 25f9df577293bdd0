// Error taxonomy for the orchestration core
// Collaborator errors are wrapped into StepFailure with the cause preserved.

export class CompetitiveIntelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Turn any thrown value into a one-line reason. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// ── Step execution ──────────────────────────────────────────────────

export class StepFailure extends CompetitiveIntelError {
  constructor(
    public readonly stepName: string,
    public readonly stepIndex: number,
    public readonly agent: string,
    cause: unknown,
  ) {
    super(`Step "${stepName}" failed: ${describeError(cause)}`, { cause });
  }

  /** The underlying reason, without the step prefix. */
  get reason(): string {
    return describeError(this.cause);
  }
}

export class StepTimeoutError extends CompetitiveIntelError {
  constructor(
    public readonly stepName: string,
    public readonly timeoutMs: number,
  ) {
    super(`${stepName} timed out after ${timeoutMs}ms`);
  }
}

export class PipelineError extends CompetitiveIntelError {
  constructor(
    message: string,
    public readonly stage: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export interface CompanyFailureSummary {
  company: string;
  stepName: string;
  reason: string;
}

export class InsufficientDataError extends CompetitiveIntelError {
  constructor(
    public readonly successful: number,
    public readonly required: number,
    public readonly failures: CompanyFailureSummary[],
  ) {
    super(
      `Need at least ${required} successful company analyses to compare, got ${successful}` +
      (failures.length > 0
        ? ` (${failures.map(f => `${f.company} failed at ${f.stepName}: ${f.reason}`).join('; ')})`
        : ''),
    );
  }
}

// ── Session persistence ─────────────────────────────────────────────

export class StorageError extends CompetitiveIntelError {
  constructor(
    message: string,
    public readonly sessionId: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class NotFoundError extends StorageError {
  constructor(sessionId: string) {
    super(`Session "${sessionId}" not found`, sessionId);
  }
}

export class CorruptDataError extends StorageError {
  constructor(sessionId: string, detail: string, cause?: unknown) {
    super(`Session "${sessionId}" is corrupt: ${detail}`, sessionId, cause);
  }
}

// ── Collaborators ───────────────────────────────────────────────────

export class SearchError extends CompetitiveIntelError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class GenerationError extends CompetitiveIntelError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

// ── Input & configuration ───────────────────────────────────────────

export class ValidationError extends CompetitiveIntelError {}

export class ConfigError extends CompetitiveIntelError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
  }
}
