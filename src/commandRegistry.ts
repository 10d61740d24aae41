import type { Command } from 'commander';

import { registerAlgorithmsCommand } from '@/commands/algorithms.js';
import { registerEntriesCommands } from '@/commands/entries.js';
import { registerRequestCommands } from '@/commands/request.js';
import { registerResponseCommands } from '@/commands/response.js';
import { registerSizesCommand } from '@/commands/sizes.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Headers:'),
  registerRequestCommands,
  registerResponseCommands,

  addCommandGroup('Payloads:'),
  registerEntriesCommands,

  addCommandGroup('Reference:'),
  registerAlgorithmsCommand,
  registerSizesCommand,
];
