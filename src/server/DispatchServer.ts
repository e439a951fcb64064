/**
 * Dispatch Server
 *
 * Owns the Serializer and both listeners, and starts and stops them together.
 * The host application supplies the Session API and, optionally, its own
 * registry; the registry is sealed here if the caller has not already done so.
 */

import type { AddressInfo } from 'node:net';

import { DEFAULT_HOST, DEFAULT_QUEUE_CAPACITY, DEFAULT_TCP_PORT, DEFAULT_UDP_PORT } from '@/constants.js';
import { createDefaultRegistry, type CommandRegistry } from '@/registry/index.js';
import type { SessionApi } from '@/session/types.js';
import { createLogger, stderrSink, type Logger, type LogSink } from '@/ui/logging/index.js';

import {
  ExecutionSerializer,
  immediateScheduler,
  type Scheduler,
  type SerializerStats,
} from './ExecutionSerializer.js';
import { LossyListener, type LossyStats } from './LossyListener.js';
import type { ConnectionLimits } from './ReliableConnection.js';
import { ReliableListener } from './ReliableListener.js';

export interface DispatchServerOptions extends Partial<ConnectionLimits> {
  session: SessionApi;
  /** Defaults to the built-in catalog */
  registry?: CommandRegistry;
  host?: string;
  tcpPort?: number;
  udpPort?: number;
  queueCapacity?: number;
  schedule?: Scheduler;
  /** Where every component's log lines go (default stderr) */
  logSink?: LogSink;
}

export interface DispatchServerAddresses {
  tcp: AddressInfo;
  udp: AddressInfo;
}

export interface DispatchServerStats {
  serializer: SerializerStats;
  lossy: LossyStats;
  connections: number;
}

export class DispatchServer {
  readonly registry: CommandRegistry;
  readonly serializer: ExecutionSerializer;
  private readonly reliable: ReliableListener;
  private readonly lossy: LossyListener;
  private readonly log: Logger;
  private running = false;

  constructor(options: DispatchServerOptions) {
    const sink = options.logSink ?? stderrSink;
    const host = options.host ?? DEFAULT_HOST;

    this.log = createLogger('server', sink);
    this.registry = options.registry ?? createDefaultRegistry();
    if (!this.registry.isSealed) {
      this.registry.seal();
    }

    this.serializer = new ExecutionSerializer({
      registry: this.registry,
      session: options.session,
      capacity: options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
      schedule: options.schedule ?? immediateScheduler,
      logger: createLogger('serializer', sink),
    });

    this.reliable = new ReliableListener({
      ...pickLimits(options),
      serializer: this.serializer,
      registry: this.registry,
      host,
      port: options.tcpPort ?? DEFAULT_TCP_PORT,
      logger: createLogger('reliable', sink),
    });

    this.lossy = new LossyListener({
      serializer: this.serializer,
      registry: this.registry,
      host,
      port: options.udpPort ?? DEFAULT_UDP_PORT,
      logger: createLogger('lossy', sink),
    });
  }

  /**
   * Bind both listeners. If the second bind fails the first is released.
   */
  async start(): Promise<DispatchServerAddresses> {
    if (this.running) {
      throw new Error('Dispatch server already started');
    }

    const tcp = await this.reliable.start();
    let udp: AddressInfo;
    try {
      udp = await this.lossy.start();
    } catch (error) {
      await this.reliable.stop();
      throw error;
    }

    this.running = true;
    this.log.info(
      `Listening on tcp ${tcp.address}:${tcp.port} and udp ${udp.address}:${udp.port} (${this.registry.size} commands)`
    );
    return { tcp, udp };
  }

  /**
   * Close both listeners, then let the Serializer finish what it already holds.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    await Promise.all([this.reliable.stop(), this.lossy.stop()]);
    await this.serializer.close();
    this.log.info('Stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  stats(): DispatchServerStats {
    return {
      serializer: this.serializer.stats(),
      lossy: this.lossy.stats(),
      connections: this.reliable.connectionCount,
    };
  }
}

function pickLimits(options: Partial<ConnectionLimits>): Partial<ConnectionLimits> {
  const limits: Partial<ConnectionLimits> = {};
  for (const key of ['idleTimeoutMs', 'commandTimeoutMs', 'writeTimeoutMs', 'maxFrameBytes'] as const) {
    const value = options[key];
    if (value !== undefined) {
      limits[key] = value;
    }
  }
  return limits;
}
