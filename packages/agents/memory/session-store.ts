// Session Store: durable session records, one JSON file per session
// FileSessionStore is the sole reader/writer of the session directory;
// InMemorySessionStore keeps serialized copies for tests and disk-less runs.

import { randomUUID } from 'node:crypto';
import { access, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Session } from '../types/session.js';
import { decodeSession, encodeSession, newSession } from './session-codec.js';
import { CorruptDataError, NotFoundError, StorageError, describeError } from '../utils/errors.js';
import { isValidSessionId } from '../utils/naming.js';

export interface CreateSessionOptions {
  /** Replace an existing session with the same id instead of failing. */
  overwrite?: boolean;
  now?: Date;
}

export interface SessionStore {
  create(sessionId: string, options?: CreateSessionOptions): Promise<Session>;
  save(session: Session): Promise<void>;
  load(sessionId: string): Promise<Session>;
  exists(sessionId: string): Promise<boolean>;
  list(): Promise<string[]>;
}

function assertValidId(sessionId: string): void {
  if (!isValidSessionId(sessionId)) {
    throw new StorageError(`Invalid session id "${sessionId}"`, sessionId);
  }
}

function parseStored(sessionId: string, text: string): Session {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new CorruptDataError(sessionId, `invalid JSON (${describeError(err)})`, err);
  }

  const decoded = decodeSession(raw);
  if (!decoded.ok) throw new CorruptDataError(sessionId, decoded.issues);
  if (decoded.session.data.sessionId !== sessionId) {
    throw new CorruptDataError(
      sessionId,
      `file holds session "${decoded.session.data.sessionId}"`,
    );
  }
  return decoded.session;
}

// ── File-backed store ───────────────────────────────────────────────

export class FileSessionStore implements SessionStore {
  // Per-session write queue: one writer at a time for any given file.
  // The stored tail never rejects; errors surface through the promise
  // returned to each caller.
  private pending = new Map<string, Promise<void>>();

  constructor(readonly directory: string) {}

  pathFor(sessionId: string): string {
    assertValidId(sessionId);
    return join(this.directory, `${sessionId}.json`);
  }

  async create(sessionId: string, options: CreateSessionOptions = {}): Promise<Session> {
    assertValidId(sessionId);
    if (!options.overwrite && await this.exists(sessionId)) {
      throw new StorageError(`Session "${sessionId}" already exists`, sessionId);
    }
    const session = newSession(sessionId, options.now ?? new Date());
    await this.save(session);
    return session;
  }

  async save(session: Session): Promise<void> {
    const sessionId = session.data.sessionId;
    const file = this.pathFor(sessionId);
    // Serialize now so later in-memory mutation cannot leak into this write
    const body = JSON.stringify(encodeSession(session), null, 2);

    const previous = this.pending.get(sessionId) ?? Promise.resolve();
    const write = previous.then(() => this.writeAtomically(sessionId, file, body));
    this.pending.set(sessionId, write.then(() => undefined, () => undefined));
    return write;
  }

  async load(sessionId: string): Promise<Session> {
    const file = this.pathFor(sessionId);
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) throw new NotFoundError(sessionId);
      throw new StorageError(`Failed to read session "${sessionId}": ${describeError(err)}`, sessionId, err);
    }
    return parseStored(sessionId, text);
  }

  async exists(sessionId: string): Promise<boolean> {
    try {
      await access(this.pathFor(sessionId));
      return true;
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return false;
      throw new StorageError(`Failed to stat session "${sessionId}": ${describeError(err)}`, sessionId, err);
    }
  }

  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return [];
      throw new StorageError(`Failed to list sessions: ${describeError(err)}`, '*', err);
    }
    return names
      .filter(n => n.endsWith('.json'))
      .map(n => n.slice(0, -'.json'.length))
      .filter(isValidSessionId)
      .sort();
  }

  private async writeAtomically(sessionId: string, file: string, body: string): Promise<void> {
    const tmp = `${file}.${randomUUID().slice(0, 8)}.tmp`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tmp, body, 'utf-8');
      await rename(tmp, file);
    } catch (err) {
      await rm(tmp, { force: true });
      throw new StorageError(`Failed to save session "${sessionId}": ${describeError(err)}`, sessionId, err);
    }
  }
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

// ── In-memory store ─────────────────────────────────────────────────

export class InMemorySessionStore implements SessionStore {
  private records = new Map<string, string>();

  async create(sessionId: string, options: CreateSessionOptions = {}): Promise<Session> {
    assertValidId(sessionId);
    if (!options.overwrite && this.records.has(sessionId)) {
      throw new StorageError(`Session "${sessionId}" already exists`, sessionId);
    }
    const session = newSession(sessionId, options.now ?? new Date());
    await this.save(session);
    return session;
  }

  async save(session: Session): Promise<void> {
    assertValidId(session.data.sessionId);
    this.records.set(session.data.sessionId, JSON.stringify(encodeSession(session)));
  }

  async load(sessionId: string): Promise<Session> {
    assertValidId(sessionId);
    const text = this.records.get(sessionId);
    if (text === undefined) throw new NotFoundError(sessionId);
    return parseStored(sessionId, text);
  }

  async exists(sessionId: string): Promise<boolean> {
    return this.records.has(sessionId);
  }

  async list(): Promise<string[]> {
    return [...this.records.keys()].sort();
  }

  /** Test hook: plant raw file content for a session id. */
  putRaw(sessionId: string, text: string): void {
    this.records.set(sessionId, text);
  }
}
