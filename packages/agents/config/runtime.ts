// Collaborator factory: wires concrete adapters from settings
// Session stores are selected by COMPINTEL_SESSION_BACKEND ('file' | 'memory').

import type { TokenUsage } from '../types/collaborators.js';
import type { EventBus } from '../types/events.js';
import { FileSessionStore, InMemorySessionStore, type SessionStore } from '../memory/session-store.js';
import { MemoryManager, type MemoryManagerOptions } from '../memory/memory-manager.js';
import { SerpApiSearch } from '../bridge/serpapi-search.js';
import { AnthropicGenerator } from '../bridge/anthropic-generator.js';
import { HtmlPageFetcher } from '../bridge/page-fetcher.js';
import { JsonChartRenderer, MarkdownReportExporter } from '../bridge/file-exporters.js';
import type { ComparisonOrchestratorDeps } from '../orchestrator/comparison-orchestrator.js';
import { requireApiKeys, type Settings } from './settings.js';

export interface RuntimeHooks {
  /** Token usage reported by the generation service, per call. */
  onUsage?: (usage: TokenUsage) => void;
  eventBus?: EventBus;
  clock?: () => Date;
}

export function createSessionStore(settings: Settings): SessionStore {
  switch (settings.sessionBackend) {
    case 'memory':
      return new InMemorySessionStore();
    case 'file':
    default:
      return new FileSessionStore(settings.sessionDir);
  }
}

/**
 * Session for an analysis run: restored when an id is given, otherwise new.
 * The API keys are checked first so a run that cannot start leaves no
 * session behind.
 */
export async function openRunSession(
  settings: Settings,
  store: SessionStore,
  sessionId?: string,
  options: MemoryManagerOptions = {},
): Promise<MemoryManager> {
  requireApiKeys(settings);
  return sessionId
    ? MemoryManager.restore(store, sessionId, options)
    : MemoryManager.open(store, undefined, options);
}

/**
 * Everything the pipelines need to run against the real services.
 * Throws ConfigError when an API key is missing.
 */
export function createCollaborators(
  settings: Settings,
  hooks: RuntimeHooks = {},
): ComparisonOrchestratorDeps {
  const keys = requireApiKeys(settings);

  return {
    search: new SerpApiSearch({ apiKey: keys.serpApiKey, baseUrl: settings.serpApiBaseUrl }),
    generator: new AnthropicGenerator({
      apiKey: keys.anthropicApiKey,
      model: settings.model,
      maxTokens: settings.maxTokens,
      onUsage: hooks.onUsage,
    }),
    pageFetcher: settings.fetchPages ? new HtmlPageFetcher() : undefined,
    reportExporter: new MarkdownReportExporter(settings.outputDir),
    chartRenderer: new JsonChartRenderer(settings.outputDir, hooks.clock),
    stepTimeoutMs: settings.stepTimeoutMs,
    eventBus: hooks.eventBus,
    clock: hooks.clock,
  };
}
