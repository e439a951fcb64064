import { Option, type Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { DEFAULT_CATALOG, SafetyTier, type CatalogEntry } from '@/registry/index.js';
import { OutputFormatter } from '@/ui/formatting.js';
import { unknownCommandError } from '@/ui/messages/errors.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { suggestNames } from '@/utils/suggestions.js';

interface CommandsOptions extends BaseCommandOptions {
  tier?: string;
}

function formatEntries(entries: CatalogEntry[]): string {
  const width = Math.max(...entries.map((entry) => entry.name.length)) + 2;
  const row = (entry: CatalogEntry): string => `${entry.name.padEnd(width)}${entry.description}`;

  const lossy = entries.filter((entry) => entry.tier === SafetyTier.LossyEligible);
  const reliable = entries.filter((entry) => entry.tier === SafetyTier.NeverLossy);

  const output = new OutputFormatter();
  if (reliable.length > 0) {
    output.section('Reliable only (call):', reliable.map(row));
  }
  if (lossy.length > 0) {
    if (reliable.length > 0) {
      output.blank();
    }
    output.section('Lossy eligible (call or cast):', lossy.map(row));
  }
  return output.build();
}

/**
 * Register the `commands` command: list the built-in catalog with tiers.
 */
export function registerCommandsCommand(program: Command): void {
  program
    .command('commands')
    .description('List the built-in commands and their transport tier')
    .argument('[name]', 'Show a single command')
    .addOption(
      new Option('--tier <tier>', 'Only commands of one tier').choices(['lossy', 'reliable'])
    )
    .addOption(jsonOption)
    .action(async (name: string | undefined, options: CommandsOptions) => {
      await runCommand<CommandsOptions, CatalogEntry[]>(
        async (opts) => {
          let entries = [...DEFAULT_CATALOG];

          if (name !== undefined) {
            entries = entries.filter((entry) => entry.name === name);
            if (entries.length === 0) {
              const suggestions = suggestNames(
                name,
                DEFAULT_CATALOG.map((entry) => entry.name)
              );
              throw new CommandError(
                unknownCommandError(name, suggestions),
                {},
                EXIT_CODES.RESOURCE_NOT_FOUND
              );
            }
          }

          if (opts.tier === 'lossy') {
            entries = entries.filter((entry) => entry.tier === SafetyTier.LossyEligible);
          } else if (opts.tier === 'reliable') {
            entries = entries.filter((entry) => entry.tier === SafetyTier.NeverLossy);
          }

          return { success: true, data: entries };
        },
        options,
        formatEntries
      );
    });
}
