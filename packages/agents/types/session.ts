// Session & conversation history
// One Session per user-initiated analysis run; its history is append-only.

export type MessageRole = 'user' | 'system' | 'assistant';

/** Open-ended tags for filtering/debugging. Never required for control flow. */
export type MessageMetadata = Record<string, unknown>;

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: string;   // ISO-8601
  readonly metadata: Readonly<MessageMetadata>;
}

export interface SessionData {
  readonly sessionId: string;
  readonly createdAt: string;
  lastUpdated: string;
  analysisCount: number;
  totalTokensUsed: number;      // best-effort; providers may never report usage
  companyName?: string;
  reportFilename?: string;
}

export interface Session {
  data: SessionData;
  history: Message[];
}

export interface SessionStats {
  sessionId: string;
  createdAt: string;
  lastUpdated: string;
  messageCount: number;
  analysisCount: number;
  totalTokensUsed: number;
}

export type PersistResult =
  | { status: 'saved' }
  | { status: 'deferred' }
  | { status: 'failed'; error: Error };

/**
 * The mutation surface a pipeline step sees. Implemented by MemoryManager
 * (writes straight into the session) and SessionBuffer (isolated buffer
 * merged later).
 */
export interface SessionRecorder {
  record(role: MessageRole, content: string, metadata?: MessageMetadata): Message;
  markAnalysisComplete(companyName: string, reportFilename: string): void;
  persist(): Promise<PersistResult>;
}
