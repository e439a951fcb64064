/**
 * Execution Serializer
 *
 * The single place where commands touch host state. Any number of producers
 * (every reliable connection, the lossy receive loop) submit; one consumer
 * runs the commands, one at a time, in submission order, on the host's
 * scheduling primitive.
 *
 * Ordering: strict FIFO across all producers combined. Nothing relates the
 * order of two transports beyond the moment each submission reached `submit`.
 *
 * Backpressure: the queue is bounded. A submission that finds it full is
 * rejected immediately with QUEUE_FULL; queued work is never evicted.
 */

import {
  DispatchError,
  ErrorCode,
  ExecutionError,
  HandlerError,
  type Command,
  type CommandResult,
  type CompletionHandler,
} from '@/protocol/index.js';
import type { CommandDescriptor, CommandRegistry } from '@/registry/index.js';
import type { SessionApi } from '@/session/types.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

/**
 * Hands a task to the host's execution context, e.g. a host-provided
 * "schedule message" callback. Must run tasks in the order given.
 */
export type Scheduler = (task: () => void) => void;

export const immediateScheduler: Scheduler = (task) => {
  setImmediate(task);
};

export interface ExecutionSerializerOptions {
  registry: CommandRegistry;
  session: SessionApi;
  /** Maximum queued (not yet running) commands */
  capacity?: number;
  schedule?: Scheduler;
  logger?: Logger;
}

export interface SerializerStats {
  pending: number;
  executed: number;
  failed: number;
  rejected: number;
}

interface PendingTask {
  command: Command;
  onComplete: CompletionHandler;
}

export class ExecutionSerializer {
  private readonly registry: CommandRegistry;
  private readonly session: SessionApi;
  private readonly schedule: Scheduler;
  private readonly log: Logger;
  readonly capacity: number;

  private readonly queue: PendingTask[] = [];
  /** True from the moment a step is scheduled until the queue runs dry. */
  private active = false;
  private closing = false;
  private idleWaiters: Array<() => void> = [];
  private readonly counters = { executed: 0, failed: 0, rejected: 0 };

  constructor(options: ExecutionSerializerOptions) {
    this.registry = options.registry;
    this.session = options.session;
    this.capacity = options.capacity ?? 1024;
    this.schedule = options.schedule ?? immediateScheduler;
    this.log = options.logger ?? createLogger('serializer');

    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new RangeError('Serializer capacity must be a positive integer');
    }
  }

  /**
   * Queue a command. Never blocks and never throws; the outcome always
   * arrives through `onComplete`, exactly once. Rejections (queue full,
   * closing) are delivered before `submit` returns.
   */
  submit(command: Command, onComplete: CompletionHandler): void {
    if (this.closing) {
      this.deliver(command, onComplete, {
        ok: false,
        error: new ExecutionError('Server is shutting down', ErrorCode.SERVER_CLOSING),
      });
      return;
    }

    if (this.queue.length >= this.capacity) {
      this.counters.rejected++;
      this.deliver(command, onComplete, {
        ok: false,
        error: new ExecutionError(
          `Execution queue full (${this.capacity} pending)`,
          ErrorCode.QUEUE_FULL
        ),
      });
      return;
    }

    this.queue.push({ command, onComplete });
    this.log.debug(`Queued ${command.name} from ${command.transport} (${this.queue.length} pending)`);
    this.wake();
  }

  /**
   * Queue a command and wait for its result.
   */
  execute(command: Command): Promise<CommandResult> {
    return new Promise((resolve) => this.submit(command, resolve));
  }

  /**
   * Resolves once the queue is empty and nothing is running.
   */
  drain(): Promise<void> {
    if (!this.active && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stop accepting work, then wait for what is already queued.
   */
  async close(): Promise<void> {
    this.closing = true;
    await this.drain();
  }

  get pending(): number {
    return this.queue.length;
  }

  stats(): SerializerStats {
    return { pending: this.queue.length, ...this.counters };
  }

  private wake(): void {
    if (this.active) {
      return;
    }
    this.active = true;
    this.schedule(() => this.step());
  }

  /**
   * Run the head of the queue, then hand the next step back to the scheduler.
   */
  private step(): void {
    const task = this.queue.shift();
    if (!task) {
      this.active = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
      return;
    }

    void this.run(task.command).then((result) => {
      this.deliver(task.command, task.onComplete, result);
      this.schedule(() => this.step());
    });
  }

  /**
   * Execute one command. Never rejects.
   */
  private async run(command: Command): Promise<CommandResult> {
    let descriptor: CommandDescriptor;
    try {
      descriptor = this.registry.admit(command.name, command.transport, command.correlation);
    } catch (error) {
      // Listeners classify before submitting; this only catches direct submitters
      this.counters.failed++;
      this.log.info(`Refused ${command.name} from ${command.transport}: ${getErrorMessage(error)}`);
      return { ok: false, error: toDispatchError(command, error) };
    }

    try {
      const value: unknown = await descriptor.handler(this.session, command.params);
      this.counters.executed++;
      return { ok: true, value };
    } catch (error) {
      this.counters.failed++;
      this.log.info(`${command.name} (${command.transport}) failed: ${getErrorMessage(error)}`);
      return { ok: false, error: new HandlerError(command.name, getErrorMessage(error), error) };
    }
  }

  private deliver(command: Command, onComplete: CompletionHandler, result: CommandResult): void {
    try {
      onComplete(result);
    } catch (error) {
      this.log.info(`Completion handler for ${command.name} threw: ${getErrorMessage(error)}`);
    }
  }
}

function toDispatchError(command: Command, error: unknown): DispatchError {
  if (error instanceof DispatchError) {
    return error;
  }
  return new HandlerError(command.name, getErrorMessage(error), error);
}
