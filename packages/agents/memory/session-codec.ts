// Wire format for persisted sessions
//
// {
//   session_data: { session_id, created_at, last_updated, analysis_count,
//                   total_tokens_used, company_name, report_filename },
//   conversation_history: [ { role, content, timestamp, metadata }, ... ]
// }

import { z } from 'zod';
import type { Message, MessageRole, Session } from '../types/session.js';

const RoleSchema = z
  .enum(['user', 'system', 'assistant', 'agent'])
  .transform((role): MessageRole => (role === 'agent' ? 'assistant' : role));

export const PersistedMessageSchema = z.object({
  role: RoleSchema,
  content: z.string(),
  timestamp: z.string(),
  metadata: z.record(z.unknown()).default({}),
});

export const PersistedSessionDataSchema = z.object({
  session_id: z.string().min(1),
  created_at: z.string(),
  last_updated: z.string(),
  analysis_count: z.number().int().nonnegative(),
  total_tokens_used: z.number().int().nonnegative().default(0),
  company_name: z.string().nullish(),
  report_filename: z.string().nullish(),
});

export const PersistedSessionSchema = z.object({
  session_data: PersistedSessionDataSchema,
  conversation_history: z.array(PersistedMessageSchema),
});

export type PersistedSession = z.input<typeof PersistedSessionSchema>;

export function encodeSession(session: Session): PersistedSession {
  const { data } = session;
  return {
    session_data: {
      session_id: data.sessionId,
      created_at: data.createdAt,
      last_updated: data.lastUpdated,
      analysis_count: data.analysisCount,
      total_tokens_used: data.totalTokensUsed,
      company_name: data.companyName ?? null,
      report_filename: data.reportFilename ?? null,
    },
    conversation_history: session.history.map(m => ({
      role: m.role,
      content: m.content,
      timestamp: m.timestamp,
      metadata: { ...m.metadata },
    })),
  };
}

export type DecodeResult =
  | { ok: true; session: Session }
  | { ok: false; issues: string };

export function decodeSession(raw: unknown): DecodeResult {
  const parsed = PersistedSessionSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    return { ok: false, issues };
  }

  const { session_data: d, conversation_history: history } = parsed.data;
  const session: Session = {
    data: {
      sessionId: d.session_id,
      createdAt: d.created_at,
      lastUpdated: d.last_updated,
      analysisCount: d.analysis_count,
      totalTokensUsed: d.total_tokens_used,
      ...(d.company_name ? { companyName: d.company_name } : {}),
      ...(d.report_filename ? { reportFilename: d.report_filename } : {}),
    },
    history: history.map((m): Message => Object.freeze({
      role: m.role,
      content: m.content,
      timestamp: m.timestamp,
      metadata: Object.freeze({ ...m.metadata }),
    })),
  };
  return { ok: true, session };
}

export function newSession(sessionId: string, now: Date): Session {
  const stamp = now.toISOString();
  return {
    data: {
      sessionId,
      createdAt: stamp,
      lastUpdated: stamp,
      analysisCount: 0,
      totalTokensUsed: 0,
    },
    history: [],
  };
}
