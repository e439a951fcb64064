import { Option, type Command } from 'commander';

import { DispatchClient } from '@/client/index.js';
import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { hostOption, jsonOption, udpPortOption } from '@/commands/shared/commonOptions.js';
import { parseParams, positiveIntRule } from '@/commands/shared/validation.js';
import { DEFAULT_CATALOG, SafetyTier } from '@/registry/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { castNotAllowedError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Flags supported by `mixcast cast`.
 */
interface CastOptions extends BaseCommandOptions {
  host: string;
  udpPort: number;
  repeat: number;
}

interface CastResult {
  type: string;
  sent: number;
}

/**
 * Refuse catalog commands the server would drop anyway. Names outside the
 * catalog are sent as-is, since a host may register its own.
 */
function assertCastable(type: string): void {
  const entry = DEFAULT_CATALOG.find((candidate) => candidate.name === type);
  if (entry && entry.tier !== SafetyTier.LossyEligible) {
    throw new CommandError(
      castNotAllowedError(type),
      { suggestion: `Use: mixcast call ${type}` },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
}

/**
 * Register the `cast` command: fire-and-forget over the lossy channel.
 */
export function registerCastCommand(program: Command): void {
  program
    .command('cast')
    .description('Send a command over the lossy channel without waiting for a result')
    .argument('<type>', 'Command name, e.g. set_track_volume')
    .argument('[params]', 'Parameters as a JSON object')
    .addOption(hostOption())
    .addOption(udpPortOption())
    .addOption(
      new Option('--repeat <n>', 'Send the same datagram n times')
        .default(1)
        .argParser((value) => positiveIntRule({ name: 'repeat', min: 1, max: 100_000 }).validate(value))
    )
    .addOption(jsonOption)
    .action(async (type: string, rawParams: string | undefined, options: CastOptions) => {
      await runCommand<CastOptions, CastResult>(
        async (opts) => {
          assertCastable(type);
          const params = parseParams(rawParams);
          const client = new DispatchClient({ host: opts.host, udpPort: opts.udpPort });
          for (let i = 0; i < opts.repeat; i++) {
            client.cast(type, params);
          }
          await client.close();
          return { success: true, data: { type, sent: opts.repeat } };
        },
        options,
        (data) => `Sent ${data.type} x${data.sent} (not acknowledged)`
      );
    });
}
