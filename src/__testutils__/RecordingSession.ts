/**
 * RecordingSession - SessionApi fake that records every invocation
 *
 * Returns `{ command, params }` by default; individual commands can be given
 * their own behavior (a value, a delay, a throw).
 */

import type { CommandParams } from '@/protocol/index.js';
import type { SessionApi } from '@/session/types.js';

export interface Invocation {
  name: string;
  params: CommandParams;
}

export type Behavior = (params: CommandParams) => unknown;

export class RecordingSession implements SessionApi {
  readonly invocations: Invocation[] = [];
  /** Commands currently inside `invoke` (sync or awaiting) */
  active = 0;
  /** Highest value `active` has reached */
  maxActive = 0;

  private readonly behaviors = new Map<string, Behavior>();

  /**
   * Give one command its own behavior.
   *
   * @example
   * session.on('delete_track', () => { throw new Error('Track index out of range'); });
   */
  on(name: string, behavior: Behavior): this {
    this.behaviors.set(name, behavior);
    return this;
  }

  invoke(name: string, params: CommandParams): unknown {
    this.invocations.push({ name, params });
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);

    const behavior = this.behaviors.get(name);
    let result: unknown;
    try {
      result = behavior ? behavior(params) : { command: name, params };
    } catch (error) {
      this.active--;
      throw error;
    }

    if (result instanceof Promise) {
      return result.finally(() => {
        this.active--;
      });
    }
    this.active--;
    return result;
  }

  names(): string[] {
    return this.invocations.map((invocation) => invocation.name);
  }

  count(name: string): number {
    return this.invocations.filter((invocation) => invocation.name === name).length;
  }
}
