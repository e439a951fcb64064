/**
 * Reliable Channel Listener
 *
 * TCP server for request/response commands. Wraps net.Server and tracks one
 * ReliableConnection per accepted socket.
 */

import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';

import {
  COMMAND_TIMEOUT_MS,
  DEFAULT_HOST,
  DEFAULT_TCP_PORT,
  MAX_FRAME_BYTES,
  RELIABLE_IDLE_TIMEOUT_MS,
  RESPONSE_WRITE_TIMEOUT_MS,
} from '@/constants.js';
import type { CommandRegistry } from '@/registry/index.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';

import type { ExecutionSerializer } from './ExecutionSerializer.js';
import { ReliableConnection, type ConnectionLimits } from './ReliableConnection.js';

export interface ReliableListenerOptions extends Partial<ConnectionLimits> {
  serializer: ExecutionSerializer;
  registry: CommandRegistry;
  host?: string;
  /** 0 picks an ephemeral port */
  port?: number;
  logger?: Logger;
}

export class ReliableListener {
  private server: Server | null = null;
  private readonly connections = new Set<ReliableConnection>();
  private readonly log: Logger;
  private readonly host: string;
  private readonly port: number;
  private readonly limits: ConnectionLimits;

  constructor(private readonly options: ReliableListenerOptions) {
    this.log = options.logger ?? createLogger('reliable');
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_TCP_PORT;
    this.limits = {
      idleTimeoutMs: options.idleTimeoutMs ?? RELIABLE_IDLE_TIMEOUT_MS,
      commandTimeoutMs: options.commandTimeoutMs ?? COMMAND_TIMEOUT_MS,
      writeTimeoutMs: options.writeTimeoutMs ?? RESPONSE_WRITE_TIMEOUT_MS,
      maxFrameBytes: options.maxFrameBytes ?? MAX_FRAME_BYTES,
    };
  }

  /**
   * Start accepting connections.
   *
   * @returns The bound address (useful when listening on port 0)
   */
  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Reliable listener already started');
    }

    const server = createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        this.server = null;
        reject(error);
      };
      server.once('error', onError);
      server.listen(this.port, this.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.log.info(`Server error: ${error.message}`);
    });

    const address = this.address();
    if (!address) {
      throw new Error('Reliable listener has no bound address');
    }
    this.log.debug(`Listening on ${address.address}:${address.port}`);
    return address;
  }

  /**
   * Stop accepting, drop every open connection, wait for the server to close.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    for (const connection of this.connections) {
      connection.destroy();
    }
    this.connections.clear();
    await closed;
    this.log.debug('Stopped');
  }

  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  private accept(socket: Socket): void {
    const connection = new ReliableConnection(socket, {
      ...this.limits,
      serializer: this.options.serializer,
      registry: this.options.registry,
      logger: this.log,
    });
    this.connections.add(connection);
    connection.open(() => this.connections.delete(connection));
    this.log.debug(`Accepted ${connection.remote}`);
  }
}
