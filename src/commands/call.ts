import type { Command } from 'commander';

import { DispatchClient, DispatchCommandError } from '@/client/index.js';
import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  hostOption,
  jsonOption,
  tcpPortOption,
  timeoutOption,
} from '@/commands/shared/commonOptions.js';
import { parseParams } from '@/commands/shared/validation.js';
import { ErrorCode } from '@/protocol/index.js';
import { DEFAULT_CATALOG } from '@/registry/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { formatValue } from '@/ui/formatting.js';
import { unknownCommandError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { suggestNames } from '@/utils/suggestions.js';

/**
 * Flags supported by `mixcast call`.
 */
interface CallOptions extends BaseCommandOptions {
  host: string;
  port: number;
  timeout: number;
}

/**
 * Register the `call` command: one request over the reliable channel, result
 * printed to stdout.
 */
export function registerCallCommand(program: Command): void {
  program
    .command('call')
    .description('Send a command over the reliable channel and print its result')
    .argument('<type>', 'Command name, e.g. get_info')
    .argument('[params]', 'Parameters as a JSON object')
    .addOption(hostOption())
    .addOption(tcpPortOption())
    .addOption(timeoutOption())
    .addOption(jsonOption)
    .action(async (type: string, rawParams: string | undefined, options: CallOptions) => {
      await runCommand(
        async (opts) => {
          const params = parseParams(rawParams);
          const client = new DispatchClient({
            host: opts.host,
            tcpPort: opts.port,
            timeoutMs: opts.timeout,
          });
          try {
            return { success: true, data: await client.call(type, params) };
          } catch (error) {
            if (error instanceof DispatchCommandError && error.code === ErrorCode.UNKNOWN_COMMAND) {
              const suggestions = suggestNames(
                type,
                DEFAULT_CATALOG.map((entry) => entry.name)
              );
              throw new CommandError(
                unknownCommandError(type, suggestions),
                { code: error.code },
                EXIT_CODES.COMMAND_FAILED
              );
            }
            throw error;
          } finally {
            await client.close();
          }
        },
        options,
        formatValue
      );
    });
}
