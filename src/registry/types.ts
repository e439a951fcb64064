/**
 * Command registry types.
 */

import type { CommandParams } from '@/protocol/index.js';
import type { SessionApi } from '@/session/types.js';

/**
 * Which transports may carry a command.
 *
 * Every registered command makes this decision explicitly; there is no default.
 */
export enum SafetyTier {
  /**
   * Creation/deletion, queries, transport control, undo/redo and anything
   * irreversible. Reliable transport only.
   */
  NeverLossy = 'never_lossy',
  /**
   * Idempotent last-write-wins setters, reversible toggles and trigger-style
   * fires. A dropped datagram is corrected by the next one that arrives.
   */
  LossyEligible = 'lossy_eligible',
}

/**
 * Runs one command against the session. May return a value or a promise.
 */
export type CommandHandler = (session: SessionApi, params: CommandParams) => unknown;

export interface CommandDescriptor {
  readonly name: string;
  readonly handler: CommandHandler;
  readonly tier: SafetyTier;
  readonly description: string;
}
