/**
 * One accepted reliable-channel connection.
 *
 * Requests are framed as they arrive and processed strictly one at a time:
 * decode, classify, submit, await the result, flush the response, next.
 * Only this connection waits on its own request; other connections and the
 * Serializer keep running. The socket is paused while requests are pending, so
 * a pipelining peer is held back by TCP flow control instead of server memory.
 */

import type { Socket } from 'node:net';

import {
  DispatchError,
  ErrorCode,
  ExecutionError,
  FrameTooLargeError,
  JsonFrameDecoder,
  ProtocolError,
  Transport,
  decodeCommand,
  encodeResponse,
  errorResponse,
  toResponse,
  type Command,
  type CommandResult,
  type Correlation,
  type DispatchResponse,
} from '@/protocol/index.js';
import type { CommandRegistry } from '@/registry/index.js';
import type { Logger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import type { ExecutionSerializer } from './ExecutionSerializer.js';

export interface ConnectionLimits {
  /** Close the connection after this long without a new request (0 disables) */
  idleTimeoutMs: number;
  /** Answer COMMAND_TIMEOUT if the Serializer has not finished by then */
  commandTimeoutMs: number;
  /** Destroy the connection if one response cannot be flushed in time */
  writeTimeoutMs: number;
  maxFrameBytes: number;
}

export interface ReliableConnectionOptions extends ConnectionLimits {
  serializer: ExecutionSerializer;
  registry: CommandRegistry;
  logger: Logger;
}

type InboxItem = { kind: 'frame'; text: string } | { kind: 'oversize'; error: FrameTooLargeError };

export class ReliableConnection {
  readonly remote: string;

  private readonly decoder: JsonFrameDecoder;
  private readonly inbox: InboxItem[] = [];
  private readonly log: Logger;
  private busy = false;
  /** Peer sent FIN; finish the inbox, then end our side. */
  private peerEnded = false;
  /** Oversize frame seen; anything after it is discarded. */
  private refusing = false;
  private closed = false;

  constructor(
    private readonly socket: Socket,
    private readonly options: ReliableConnectionOptions
  ) {
    this.remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    this.decoder = new JsonFrameDecoder(options.maxFrameBytes);
    this.log = options.logger;
  }

  /**
   * Attach socket listeners and arm the idle timer.
   *
   * @param onClose - Called once the socket is fully closed
   */
  open(onClose: () => void): void {
    this.socket.setNoDelay(true);
    this.socket.setTimeout(this.options.idleTimeoutMs);

    this.socket.on('data', (chunk: Buffer) => this.handleData(chunk));

    this.socket.on('end', () => {
      this.peerEnded = true;
      if (this.decoder.hasPartialFrame()) {
        this.log.debug(`${this.remote} ended mid-frame; partial request discarded`);
        this.decoder.reset();
      }
      if (!this.busy) {
        this.socket.end();
      }
    });

    this.socket.on('timeout', () => {
      this.log.debug(`${this.remote} idle for ${this.options.idleTimeoutMs}ms, closing`);
      this.socket.destroy();
    });

    this.socket.on('error', (error) => {
      this.log.info(`Connection ${this.remote} error: ${error.message}`);
    });

    this.socket.once('close', () => {
      this.closed = true;
      this.inbox.length = 0;
      this.decoder.reset();
      this.log.debug(`${this.remote} disconnected`);
      onClose();
    });
  }

  /**
   * Tear the connection down immediately. Responses still pending are dropped.
   */
  destroy(): void {
    this.socket.destroy();
  }

  private handleData(chunk: Buffer): void {
    if (this.closed || this.refusing) {
      return;
    }

    for (const text of this.decoder.push(chunk)) {
      this.inbox.push({ kind: 'frame', text });
    }
    const overflow = this.decoder.overflow;
    if (overflow) {
      this.refusing = true;
      this.inbox.push({ kind: 'oversize', error: overflow });
    }
    if (this.inbox.length === 0) {
      return;
    }

    this.socket.pause();
    this.pump().catch((error: unknown) => {
      this.log.info(`Connection ${this.remote} failed: ${getErrorMessage(error)}`);
      this.destroy();
    });
  }

  /**
   * Work through the inbox one request at a time.
   */
  private async pump(): Promise<void> {
    if (this.busy) {
      return;
    }
    this.busy = true;
    this.socket.setTimeout(0);

    try {
      let item = this.inbox.shift();
      while (item && !this.closed) {
        await this.process(item);
        item = this.inbox.shift();
      }
    } finally {
      this.busy = false;
    }

    if (this.closed) {
      return;
    }
    this.socket.setTimeout(this.options.idleTimeoutMs);
    if (this.refusing || this.peerEnded) {
      this.socket.end();
      return;
    }
    this.socket.resume();
  }

  private async process(item: InboxItem): Promise<void> {
    if (item.kind === 'oversize') {
      this.log.info(`${this.remote}: ${item.error.message}, closing connection`);
      await this.send(errorResponse(item.error));
      return;
    }

    let command: Command;
    try {
      command = decodeCommand(item.text, Transport.Reliable);
      this.options.registry.admit(command.name, Transport.Reliable, command.correlation);
    } catch (error) {
      const failure = error instanceof DispatchError ? error : new ProtocolError(getErrorMessage(error));
      const correlation: Correlation | undefined =
        error instanceof ProtocolError ? error.correlation : undefined;
      this.log.debug(`${this.remote}: ${failure.message}`);
      await this.send(errorResponse(failure, correlation));
      return;
    }

    this.log.debug(`${this.remote} -> ${command.name}`);
    const result = await this.awaitResult(command);
    await this.send(toResponse(result, command.correlation));
  }

  /**
   * Submit to the Serializer and wait, bounded by the command timeout. A
   * result that arrives after the timeout is discarded.
   */
  private awaitResult(command: Command): Promise<CommandResult> {
    return new Promise((resolve) => {
      let settled = false;

      const timer = setTimeout(() => {
        settled = true;
        this.log.info(
          `${command.name} from ${this.remote} did not complete within ${this.options.commandTimeoutMs}ms`
        );
        resolve({
          ok: false,
          error: new ExecutionError(
            'Timeout waiting for operation to complete',
            ErrorCode.COMMAND_TIMEOUT
          ),
        });
      }, this.options.commandTimeoutMs);

      this.options.serializer.submit(command, (result) => {
        if (settled) {
          this.log.debug(`Discarding late result of ${command.name} for ${this.remote}`);
          return;
        }
        settled = true;
        clearTimeout(timer);
        resolve(result);
      });
    });
  }

  /**
   * Write one response and wait until it has been handed to the kernel.
   */
  private send(response: DispatchResponse): Promise<void> {
    if (this.closed || !this.socket.writable) {
      this.log.debug(`Dropping response for ${this.remote}: connection closed`);
      return Promise.resolve();
    }

    const payload = encodeResponse(response);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.log.info(
          `Response to ${this.remote} not flushed within ${this.options.writeTimeoutMs}ms, closing`
        );
        this.destroy();
        resolve();
      }, this.options.writeTimeoutMs);

      this.socket.write(payload, (error) => {
        clearTimeout(timer);
        if (error) {
          this.log.debug(`Write to ${this.remote} failed: ${error.message}`);
          this.destroy();
        }
        resolve();
      });
    });
  }
}
