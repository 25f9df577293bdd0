export { MemoryManager, SessionBuffer } from './memory-manager.js';
export type { MemoryManagerOptions } from './memory-manager.js';
export { FileSessionStore, InMemorySessionStore } from './session-store.js';
export type { SessionStore, CreateSessionOptions } from './session-store.js';
export { encodeSession, decodeSession, PersistedSessionSchema } from './session-codec.js';
export type { PersistedSession } from './session-codec.js';
