/**
 * Client Connection Manager
 *
 * One reusable TCP connection for `call` and one lazily created UDP socket for
 * `cast`. Calls are serialized: a request is written only after the previous
 * response has been read.
 */

import { createSocket as createDatagramSocket, type Socket as DatagramSocket } from 'node:dgram';
import { connect, type Socket } from 'node:net';

import {
  DEFAULT_HOST,
  DEFAULT_TCP_PORT,
  DEFAULT_UDP_PORT,
  MAX_DATAGRAM_BYTES,
  getCallTimeout,
} from '@/constants.js';
import {
  JsonFrameDecoder,
  encodeRequest,
  readResponse,
  type CommandParams,
} from '@/protocol/index.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';
import { ConcurrencyLimiter } from '@/utils/concurrency.js';
import { getErrorMessage } from '@/utils/errors.js';

import {
  DispatchClientError,
  DispatchCommandError,
  DispatchConnectionError,
  DispatchEarlyCloseError,
  DispatchParseError,
  DispatchTimeoutError,
} from './errors.js';

export interface DispatchClientOptions {
  host?: string;
  tcpPort?: number;
  udpPort?: number;
  /** Bound on one call: connect, write and read (default MIXCAST_CALL_TIMEOUT_MS or 15s) */
  timeoutMs?: number;
  logger?: Logger;
}

interface Link {
  socket: Socket;
  /** Settles once the socket is connected, or fails to connect. */
  ready: Promise<void>;
}

export class DispatchClient {
  readonly host: string;
  readonly tcpPort: number;
  readonly udpPort: number;
  readonly timeoutMs: number;

  private readonly log: Logger;
  private readonly limiter = new ConcurrencyLimiter(1);
  private link: Link | null = null;
  private datagrams: DatagramSocket | null = null;
  private nextId = 1;
  private pendingCasts = 0;
  private castWaiters: Array<() => void> = [];
  private closed = false;

  constructor(options: DispatchClientOptions = {}) {
    this.host = options.host ?? DEFAULT_HOST;
    this.tcpPort = options.tcpPort ?? DEFAULT_TCP_PORT;
    this.udpPort = options.udpPort ?? DEFAULT_UDP_PORT;
    this.timeoutMs = options.timeoutMs ?? getCallTimeout();
    this.log = options.logger ?? createLogger('client');
  }

  get endpoint(): string {
    return `${this.host}:${this.tcpPort}`;
  }

  /**
   * Send one command over the reliable channel and wait for its result.
   *
   * Never retries: after a transport failure the connection is dropped and the
   * error surfaces; whether the command ran is unknown to the caller.
   *
   * @throws DispatchCommandError when the server answers with an error
   * @throws DispatchTransportError subclasses for connection, timeout and parse failures
   *
   * @example
   * ```typescript
   * const client = new DispatchClient();
   * const info = await client.call('get_info');
   * await client.call('set_tempo', { tempo: 128 });
   * ```
   */
  call(name: string, params: CommandParams = {}): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new DispatchClientError('Client is closed'));
    }
    return this.limiter.run(() => this.roundTrip(name, params));
  }

  /**
   * Fire one command over the lossy channel. Returns immediately; nothing is
   * reported back, and failures are only logged.
   *
   * @example
   * ```typescript
   * client.cast('set_track_volume', { track_index: 0, volume: 0.5 });
   * ```
   */
  cast(name: string, params: CommandParams = {}): void {
    if (this.closed) {
      this.log.info(`Dropped cast ${name}: client is closed`);
      return;
    }

    const payload = Buffer.from(encodeRequest(name, params), 'utf8');
    if (payload.length > MAX_DATAGRAM_BYTES) {
      this.log.info(
        `Dropped cast ${name}: ${payload.length} bytes exceeds the ${MAX_DATAGRAM_BYTES} byte datagram limit`
      );
      return;
    }

    this.pendingCasts++;
    this.datagramSocket().send(payload, this.udpPort, this.host, (error) => {
      if (error) {
        this.log.info(`Cast ${name} failed: ${error.message}`);
      }
      this.pendingCasts--;
      if (this.pendingCasts === 0) {
        const waiters = this.castWaiters;
        this.castWaiters = [];
        for (const resolve of waiters) {
          resolve();
        }
      }
    });
  }

  /**
   * Wait for queued casts to leave, then close both sockets.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.pendingCasts > 0) {
      await new Promise<void>((resolve) => this.castWaiters.push(resolve));
    }

    const datagrams = this.datagrams;
    this.datagrams = null;
    if (datagrams) {
      await new Promise<void>((resolve) => datagrams.close(() => resolve()));
    }

    const link = this.link;
    this.link = null;
    if (link && !link.socket.destroyed) {
      await new Promise<void>((resolve) => {
        link.socket.once('close', () => resolve());
        link.socket.end();
      });
    }
  }

  private roundTrip(name: string, params: CommandParams): Promise<unknown> {
    const id = this.nextId++;
    const request = encodeRequest(name, params, id) + '\n';
    const link = this.connect(name);
    const { socket } = link;
    const decoder = new JsonFrameDecoder();

    return new Promise((resolve, reject) => {
      let settled = false;

      const finish = (error: Error | null, value?: unknown): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.off('data', onData);
        socket.off('error', onError);
        socket.off('end', onClose);
        socket.off('close', onClose);

        if (error) {
          if (!(error instanceof DispatchCommandError)) {
            this.discard(socket);
          }
          reject(error);
        } else {
          resolve(value);
        }
      };

      const onData = (chunk: Buffer): void => {
        const frames = decoder.push(chunk);
        const frame = frames[0];
        if (frame === undefined) {
          return;
        }
        if (frames.length > 1 || decoder.hasPartialFrame()) {
          finish(new DispatchParseError(name, 'Unexpected data after response'));
          return;
        }

        let parsed: unknown;
        try {
          parsed = JSON.parse(frame);
        } catch (error) {
          finish(new DispatchParseError(name, getErrorMessage(error), error));
          return;
        }

        const response = readResponse(parsed);
        if (!response) {
          finish(new DispatchParseError(name, 'Not a dispatch response'));
          return;
        }
        if (response.id !== id) {
          finish(
            new DispatchParseError(
              name,
              `Response id ${String(response.id)} does not match request id ${id}`
            )
          );
          return;
        }

        this.log.debug(`${name} response received (id ${id})`);
        if (response.status === 'error') {
          finish(new DispatchCommandError(name, response.message, response.code));
        } else {
          finish(null, response.result);
        }
      };

      const onError = (error: Error): void => {
        finish(new DispatchConnectionError(name, this.endpoint, error));
      };

      const onClose = (): void => {
        finish(new DispatchEarlyCloseError(name));
      };

      const timer = setTimeout(() => {
        finish(new DispatchTimeoutError(name, this.timeoutMs));
      }, this.timeoutMs);

      socket.on('data', onData);
      socket.once('error', onError);
      socket.once('end', onClose);
      socket.once('close', onClose);

      link.ready.then(
        () => {
          if (settled) {
            return;
          }
          socket.write(request, (error) => {
            if (error) {
              finish(new DispatchConnectionError(name, this.endpoint, error));
            }
          });
          this.log.debug(`${name} request sent (id ${id})`);
        },
        (error: unknown) => {
          finish(
            error instanceof Error ? error : new DispatchConnectionError(name, this.endpoint, error)
          );
        }
      );
    });
  }

  /**
   * Reuse the current connection or open a new one on behalf of `name`.
   */
  private connect(name: string): Link {
    if (this.link && !this.link.socket.destroyed) {
      return this.link;
    }

    const socket = connect({ host: this.host, port: this.tcpPort });
    socket.setNoDelay(true);

    const ready = new Promise<void>((resolve, reject) => {
      const cleanup = (): void => {
        socket.off('connect', onConnect);
        socket.off('error', onError);
        socket.off('close', onClose);
      };
      const onConnect = (): void => {
        cleanup();
        this.log.debug(`Connected to ${this.endpoint}`);
        resolve();
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(new DispatchConnectionError(name, this.endpoint, error));
      };
      const onClose = (): void => {
        cleanup();
        reject(new DispatchEarlyCloseError(name));
      };
      socket.once('connect', onConnect);
      socket.once('error', onError);
      socket.once('close', onClose);
    });

    // Errors between calls only retire the socket
    socket.on('error', (error) => {
      this.log.debug(`Connection to ${this.endpoint} failed: ${error.message}`);
    });
    socket.on('close', () => {
      if (this.link?.socket === socket) {
        this.link = null;
      }
    });

    const link = { socket, ready };
    this.link = link;
    return link;
  }

  private discard(socket: Socket): void {
    socket.destroy();
    if (this.link?.socket === socket) {
      this.link = null;
    }
  }

  private datagramSocket(): DatagramSocket {
    if (!this.datagrams) {
      const socket = createDatagramSocket('udp4');
      socket.on('error', (error) => {
        this.log.info(`Lossy socket error: ${error.message}`);
      });
      socket.unref();
      this.datagrams = socket;
    }
    return this.datagrams;
  }
}
