/**
 * Lossy Channel Listener
 *
 * One UDP receive loop. Each datagram carries one command; nothing is ever
 * sent back. Anything that cannot run is logged and dropped, and the loop
 * keeps going.
 */

import { createSocket, type RemoteInfo, type Socket } from 'node:dgram';
import type { AddressInfo } from 'node:net';

import { DEFAULT_HOST, DEFAULT_UDP_PORT } from '@/constants.js';
import {
  ClassificationError,
  ErrorCode,
  Transport,
  decodeCommand,
  type Command,
} from '@/protocol/index.js';
import type { CommandRegistry } from '@/registry/index.js';
import { createLogger, type Logger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import type { ExecutionSerializer } from './ExecutionSerializer.js';

export interface LossyListenerOptions {
  serializer: ExecutionSerializer;
  registry: CommandRegistry;
  host?: string;
  /** 0 picks an ephemeral port */
  port?: number;
  logger?: Logger;
}

/**
 * Datagram counters since start.
 */
export interface LossyStats {
  received: number;
  /** Handed to the Serializer (including those it then rejected as overflow) */
  submitted: number;
  malformed: number;
  unknown: number;
  /** NeverLossy commands refused on this channel */
  rejected: number;
  /** Dropped because the Serializer queue was full */
  overflow: number;
  /** Executed and failed */
  failed: number;
}

export class LossyListener {
  private socket: Socket | null = null;
  private readonly log: Logger;
  private readonly host: string;
  private readonly port: number;
  private readonly counters: LossyStats = {
    received: 0,
    submitted: 0,
    malformed: 0,
    unknown: 0,
    rejected: 0,
    overflow: 0,
    failed: 0,
  };

  constructor(private readonly options: LossyListenerOptions) {
    this.log = options.logger ?? createLogger('lossy');
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? DEFAULT_UDP_PORT;
  }

  async start(): Promise<AddressInfo> {
    if (this.socket) {
      throw new Error('Lossy listener already started');
    }

    const socket = createSocket('udp4');
    this.socket = socket;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        this.socket = null;
        socket.close();
        reject(error);
      };
      socket.once('error', onError);
      socket.bind(this.port, this.host, () => {
        socket.off('error', onError);
        resolve();
      });
    });

    socket.on('message', (message, remote) => this.handleDatagram(message, remote));
    socket.on('error', (error) => {
      this.log.info(`Socket error: ${error.message}`);
    });

    const address = socket.address();
    this.log.debug(`Listening on ${address.address}:${address.port}`);
    return address;
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return;
    }
    this.socket = null;
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    this.log.debug('Stopped');
  }

  address(): AddressInfo | null {
    return this.socket ? this.socket.address() : null;
  }

  stats(): LossyStats {
    return { ...this.counters };
  }

  private handleDatagram(message: Buffer, remote: RemoteInfo): void {
    this.counters.received++;
    const source = `${remote.address}:${remote.port}`;

    let command: Command;
    try {
      command = decodeCommand(message.toString('utf8'), Transport.Lossy);
    } catch (error) {
      this.counters.malformed++;
      this.log.info(`Dropped malformed datagram from ${source}: ${getErrorMessage(error)}`);
      return;
    }

    try {
      this.options.registry.admit(command.name, Transport.Lossy);
    } catch (error) {
      if (error instanceof ClassificationError) {
        this.counters.rejected++;
        this.log.info(`Rejected unsafe lossy submission: ${command.name} from ${source}`);
      } else {
        this.counters.unknown++;
        this.log.info(`Dropped unknown command ${command.name} from ${source}`);
      }
      return;
    }

    this.counters.submitted++;
    this.log.debug(`${source} -> ${command.name}`);
    this.options.serializer.submit(command, (result) => {
      if (result.ok) {
        return;
      }
      if (result.error.code === ErrorCode.QUEUE_FULL) {
        this.counters.overflow++;
        this.log.info(`Dropped ${command.name} from ${source}: ${result.error.message}`);
      } else if (result.error.code === ErrorCode.SERVER_CLOSING) {
        this.log.debug(`Dropped ${command.name} from ${source}: server closing`);
      } else {
        // The Serializer has already logged the failure
        this.counters.failed++;
      }
    });
  }
}
