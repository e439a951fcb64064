import { Option, type Command } from 'commander';

import { DEFAULT_QUEUE_CAPACITY, ENV } from '@/constants.js';
import { hostOption, tcpPortOption, udpPortOption } from '@/commands/shared/commonOptions.js';
import { positiveIntRule } from '@/commands/shared/validation.js';
import { DispatchServer } from '@/server/index.js';
import { MemorySession } from '@/session/index.js';
import { OutputFormatter } from '@/ui/formatting.js';
import { createLogger } from '@/ui/logging/index.js';
import { genericError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

const log = createLogger('cli');

/**
 * Flags supported by `mixcast serve`.
 */
interface ServeOptions {
  host: string;
  port: number;
  udpPort: number;
  queueCapacity: number;
  tracks: number;
}

/**
 * Start the server and keep it running until SIGINT or SIGTERM.
 */
async function serve(options: ServeOptions): Promise<void> {
  const server = new DispatchServer({
    session: new MemorySession({ tracks: options.tracks }),
    host: options.host,
    tcpPort: options.port,
    udpPort: options.udpPort,
    queueCapacity: options.queueCapacity,
  });

  try {
    const { tcp, udp } = await server.start();
    console.log(
      new OutputFormatter()
        .text('mixcast server running')
        .keyValueList([
          ['Reliable', `tcp://${tcp.address}:${tcp.port}`],
          ['Lossy', `udp://${udp.address}:${udp.port}`],
          ['Commands', String(server.registry.size)],
          ['Queue', `${options.queueCapacity} pending max`],
        ])
        .blank()
        .text('Press Ctrl+C to stop')
        .build()
    );
  } catch (error) {
    if (getErrorCode(error) === 'EADDRINUSE') {
      console.error(genericError(`Address already in use: ${getErrorMessage(error)}`));
      process.exit(EXIT_CODES.RESOURCE_BUSY);
    }
    console.error(genericError(getErrorMessage(error)));
    process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
  }

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    log.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => {
        const stats = server.stats();
        log.debug(
          `Executed ${stats.serializer.executed}, failed ${stats.serializer.failed}, lossy received ${stats.lossy.received}`
        );
        process.exit(EXIT_CODES.SUCCESS);
      },
      (error: unknown) => {
        console.error(genericError(`Shutdown failed: ${getErrorMessage(error)}`));
        process.exit(EXIT_CODES.SOFTWARE_ERROR);
      }
    );
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * Register the `serve` command.
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run a dispatch server backed by an in-memory session')
    .addOption(hostOption())
    .addOption(tcpPortOption())
    .addOption(udpPortOption())
    .addOption(
      new Option('--queue-capacity <n>', 'Commands held before new ones are rejected')
        .env(ENV.QUEUE_CAPACITY)
        .default(DEFAULT_QUEUE_CAPACITY)
        .argParser((value) => positiveIntRule({ name: 'queue-capacity', min: 1 }).validate(value))
    )
    .addOption(
      new Option('--tracks <n>', 'MIDI tracks in the session at startup')
        .default(2)
        .argParser((value) => positiveIntRule({ name: 'tracks', min: 0, max: 128 }).validate(value))
    )
    .action(async (options: ServeOptions) => {
      await serve(options);
    });
}
