#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { CommandError } from '@/ui/errors/index.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { genericError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorMessage } from '@/utils/errors.js';
import { VERSION } from '@/utils/version.js';

const CLI_NAME = 'mixcast';
const CLI_DESCRIPTION = 'Send commands to a single-threaded host over reliable and lossy channels';

const log = createLogger('mixcast');

async function main(): Promise<void> {
  // Checked before parsing so option parsers and registrars already log at debug level
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

main().catch((error: unknown) => {
  // Option parsers reject bad values with CommandError
  if (error instanceof CommandError) {
    console.error(genericError(error.message));
    process.exit(error.exitCode);
  }
  log.info(`Fatal: ${getErrorMessage(error)}`);
  process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
});
