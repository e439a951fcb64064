import type { CommandParams } from '@/protocol/index.js';

/**
 * The host's state-mutation surface.
 *
 * Injected into the server and called only from the Execution Serializer, one
 * command at a time. Implementations may throw host-specific errors; the
 * Serializer turns them into error results. A returned promise is awaited
 * before the next command starts.
 */
export interface SessionApi {
  invoke(name: string, params: CommandParams): unknown;
}
