export { loadSettings, requireApiKeys, DEFAULT_MODEL, DEFAULT_SERPAPI_BASE } from './settings.js';
export type { Settings, SessionBackend } from './settings.js';
export { createCollaborators, createSessionStore, openRunSession } from './runtime.js';
export type { RuntimeHooks } from './runtime.js';
