export { MemorySession, type MemorySessionOptions, type SessionState } from './MemorySession.js';
export type { SessionApi } from './types.js';
