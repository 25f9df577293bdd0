// Memory Manager: the single mutation point for a Session during a run
// Recording always succeeds in memory; persistence failures are reported
// through PersistResult and never roll back recorded progress.

import { randomUUID } from 'node:crypto';
import type {
  Message, MessageMetadata, MessageRole, PersistResult, Session, SessionRecorder, SessionStats,
} from '../types/session.js';
import type { EventBus } from '../types/events.js';
import type { SessionStore } from './session-store.js';
import { generateSessionId } from '../utils/naming.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';

export interface MemoryManagerOptions {
  clock?: () => Date;
  eventBus?: EventBus;
  logger?: Logger;
}

function createMessage(
  role: MessageRole,
  content: string,
  metadata: MessageMetadata,
  at: Date,
): Message {
  // Deep copy: callers keep using the arrays they pass in
  return Object.freeze({
    role,
    content,
    timestamp: at.toISOString(),
    metadata: Object.freeze(structuredClone(metadata)),
  });
}

export class MemoryManager implements SessionRecorder {
  private readonly session: Session;
  private readonly store: SessionStore;
  private readonly clock: () => Date;
  private readonly eventBus?: EventBus;
  private readonly log: Logger;
  private lastPersistError: Error | undefined;

  constructor(store: SessionStore, session: Session, options: MemoryManagerOptions = {}) {
    this.store = store;
    this.session = session;
    this.clock = options.clock ?? (() => new Date());
    this.eventBus = options.eventBus;
    this.log = options.logger ?? createLogger('Memory');
  }

  /** Start a new session (generated id unless one is given). */
  static async open(
    store: SessionStore,
    sessionId?: string,
    options: MemoryManagerOptions = {},
  ): Promise<MemoryManager> {
    const now = options.clock?.() ?? new Date();
    const session = await store.create(sessionId ?? generateSessionId(now), { now });
    return new MemoryManager(store, session, options);
  }

  /** Continue a previously persisted session. */
  static async restore(
    store: SessionStore,
    sessionId: string,
    options: MemoryManagerOptions = {},
  ): Promise<MemoryManager> {
    const session = await store.load(sessionId);
    return new MemoryManager(store, session, options);
  }

  get sessionId(): string {
    return this.session.data.sessionId;
  }

  /** Error from the most recent failed persist, cleared by a successful one. */
  get persistError(): Error | undefined {
    return this.lastPersistError;
  }

  record(role: MessageRole, content: string, metadata: MessageMetadata = {}): Message {
    const now = this.clock();
    const message = createMessage(role, content, metadata, now);
    this.session.history.push(message);
    this.session.data.lastUpdated = now.toISOString();
    return message;
  }

  markAnalysisComplete(companyName: string, reportFilename: string): void {
    const data = this.session.data;
    data.analysisCount++;
    data.companyName = companyName;
    data.reportFilename = reportFilename;
    data.lastUpdated = this.clock().toISOString();
  }

  addTokensUsed(tokens: number): void {
    if (!Number.isFinite(tokens) || tokens <= 0) return;
    this.session.data.totalTokensUsed += Math.round(tokens);
  }

  statistics(): SessionStats {
    const { data, history } = this.session;
    return {
      sessionId: data.sessionId,
      createdAt: data.createdAt,
      lastUpdated: data.lastUpdated,
      messageCount: history.length,
      analysisCount: data.analysisCount,
      totalTokensUsed: data.totalTokensUsed,
    };
  }

  history(): readonly Message[] {
    return [...this.session.history];
  }

  recentContext(maxTurns = 10): readonly Message[] {
    if (maxTurns <= 0) return [];
    return this.session.history.slice(-maxTurns);
  }

  contextSummary(): string {
    const lines = [
      `Session: ${this.sessionId}`,
      `Messages: ${this.session.history.length}`,
      '',
    ];
    for (const msg of this.session.history.slice(-5)) {
      const text = msg.content.length > 100 ? `${msg.content.slice(0, 100)}...` : msg.content;
      lines.push(`[${msg.role}] ${text}`);
    }
    return lines.join('\n');
  }

  /** Deep-enough copy for persistence: messages are frozen, data is cloned. */
  snapshot(): Session {
    return {
      data: { ...this.session.data },
      history: [...this.session.history],
    };
  }

  async persist(): Promise<PersistResult> {
    try {
      await this.store.save(this.snapshot());
      this.lastPersistError = undefined;
      this.emit('SessionPersisted', { sessionId: this.sessionId, messageCount: this.session.history.length });
      return { status: 'saved' };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.lastPersistError = error;
      this.log.warn('Session persistence failed, continuing in memory', {
        sessionId: this.sessionId,
        error: describeError(err),
      });
      this.emit('PersistFailed', { sessionId: this.sessionId, error: error.message });
      return { status: 'failed', error };
    }
  }

  // ── Isolation for concurrent pipelines ──────────────────────────

  /** An isolated buffer whose records land in this session on merge(). */
  fork(): SessionBuffer {
    return new SessionBuffer(this.clock);
  }

  /**
   * Append a buffer's messages (in their recorded order) and apply its
   * completions. Runs synchronously, so concurrent merges never interleave.
   */
  merge(buffer: SessionBuffer): number {
    const { messages, completions } = buffer.drain();
    if (messages.length === 0 && completions.length === 0) return 0;

    this.session.history.push(...messages);
    for (const { companyName, reportFilename } of completions) {
      this.session.data.analysisCount++;
      this.session.data.companyName = companyName;
      this.session.data.reportFilename = reportFilename;
    }
    this.session.data.lastUpdated = this.clock().toISOString();
    return messages.length;
  }

  private emit(type: 'SessionPersisted' | 'PersistFailed', payload: Record<string, unknown>): void {
    this.eventBus?.emit({
      eventId: randomUUID(),
      type,
      timestamp: this.clock(),
      sourceContext: 'MemoryManager',
      payload,
    });
  }
}

// ── Buffered recorder ───────────────────────────────────────────────

interface BufferedCompletion {
  companyName: string;
  reportFilename: string;
}

export class SessionBuffer implements SessionRecorder {
  private messages: Message[] = [];
  private completions: BufferedCompletion[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  get size(): number {
    return this.messages.length;
  }

  record(role: MessageRole, content: string, metadata: MessageMetadata = {}): Message {
    const message = createMessage(role, content, metadata, this.clock());
    this.messages.push(message);
    return message;
  }

  markAnalysisComplete(companyName: string, reportFilename: string): void {
    this.completions.push({ companyName, reportFilename });
  }

  /** Buffered records are written when the owning session persists after merge(). */
  async persist(): Promise<PersistResult> {
    return { status: 'deferred' };
  }

  drain(): { messages: Message[]; completions: BufferedCompletion[] } {
    const drained = { messages: this.messages, completions: this.completions };
    this.messages = [];
    this.completions = [];
    return drained;
  }
}
