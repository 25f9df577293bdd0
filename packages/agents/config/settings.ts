// Runtime settings from environment variables, validated with zod
// Supported session backends: 'file' (default), 'memory'

import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';

export const DEFAULT_MODEL = 'claude-haiku-4-5-20251001';
export const DEFAULT_SERPAPI_BASE = 'https://serpapi.com/search.json';

export type SessionBackend = 'file' | 'memory';

const booleanFlag = z
  .preprocess(
    v => (typeof v === 'string' ? v.trim().toLowerCase() : v),
    z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']),
  )
  .transform(v => v === 'true' || v === '1' || v === 'yes' || v === 'on');

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  SERPAPI_KEY: z.string().optional(),
  SERPAPI_BASE_URL: z.string().url().default(DEFAULT_SERPAPI_BASE),
  COMPINTEL_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  COMPINTEL_MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  COMPINTEL_SESSION_BACKEND: z.enum(['file', 'memory']).default('file'),
  COMPINTEL_SESSION_DIR: z.string().min(1).default('sessions'),
  COMPINTEL_OUTPUT_DIR: z.string().min(1).default('.'),
  COMPINTEL_STEP_TIMEOUT_MS: z.coerce.number().int().min(0).default(180_000),
  COMPINTEL_CONCURRENCY: z.coerce.number().int().min(1).max(5).default(1),
  COMPINTEL_FETCH_PAGES: booleanFlag.default('true'),
  COMPINTEL_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export interface Settings {
  anthropicApiKey?: string;
  serpApiKey?: string;
  serpApiBaseUrl: string;
  model: string;
  maxTokens: number;
  sessionBackend: SessionBackend;
  sessionDir: string;
  outputDir: string;
  /** 0 disables the per-step timeout */
  stepTimeoutMs: number;
  concurrency: number;
  fetchPages: boolean;
  logLevel: LogLevel;
}

/**
 * Validate the environment. Empty values count as unset; every invalid
 * variable is reported at once.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    serpApiKey: e.SERPAPI_KEY,
    serpApiBaseUrl: e.SERPAPI_BASE_URL,
    model: e.COMPINTEL_MODEL,
    maxTokens: e.COMPINTEL_MAX_TOKENS,
    sessionBackend: e.COMPINTEL_SESSION_BACKEND,
    sessionDir: e.COMPINTEL_SESSION_DIR,
    outputDir: e.COMPINTEL_OUTPUT_DIR,
    stepTimeoutMs: e.COMPINTEL_STEP_TIMEOUT_MS,
    concurrency: e.COMPINTEL_CONCURRENCY,
    fetchPages: e.COMPINTEL_FETCH_PAGES,
    logLevel: e.COMPINTEL_LOG_LEVEL,
  };
}

/** The API keys an analysis run needs; throws ConfigError naming the missing ones. */
export function requireApiKeys(settings: Settings): { anthropicApiKey: string; serpApiKey: string } {
  const { anthropicApiKey, serpApiKey } = settings;
  if (anthropicApiKey && serpApiKey) return { anthropicApiKey, serpApiKey };

  const missing: string[] = [];
  if (!anthropicApiKey) missing.push('ANTHROPIC_API_KEY is required');
  if (!serpApiKey) missing.push('SERPAPI_KEY is required');
  throw new ConfigError(missing);
}
