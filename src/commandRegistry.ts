import type { Command } from 'commander';

import { registerCallCommand } from '@/commands/call.js';
import { registerCastCommand } from '@/commands/cast.js';
import { registerCommandsCommand } from '@/commands/commands.js';
import { registerServeCommand } from '@/commands/serve.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping.
 * Order matters: groups organize commands in help output.
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Server:'),
  registerServeCommand,

  addCommandGroup('Client:'),
  registerCallCommand,
  registerCastCommand,

  addCommandGroup('Catalog:'),
  registerCommandsCommand,
];
