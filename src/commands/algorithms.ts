import type { Command } from 'commander';

import type { BaseCommandOptions, CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import {
  algorithmName,
  ALGORITHMS,
  isHybrid,
  operationName,
  OPERATIONS,
} from '@/framing/protocol/index.js';
import { OutputFormatter } from '@/ui/formatting.js';

export interface TagEntry {
  name: string;
  value: number;
}

export interface AlgorithmEntry extends TagEntry {
  hybrid: boolean;
}

export interface TagListing {
  algorithms: AlgorithmEntry[];
  operations: TagEntry[];
}

/**
 * List every algorithm and operation tag with its wire value.
 */
export function listTags(_options: BaseCommandOptions): CommandResult<TagListing> {
  return {
    success: true,
    data: {
      algorithms: ALGORITHMS.map((value) => ({
        name: algorithmName(value),
        value,
        hybrid: isHybrid(value),
      })),
      operations: OPERATIONS.map((value) => ({ name: operationName(value), value })),
    },
  };
}

export function formatTags(data: TagListing): string {
  const width = Math.max(...data.algorithms.map((entry) => entry.name.length)) + 2;
  const row = (entry: TagEntry, suffix = ''): string =>
    `${String(entry.value).padStart(3)}  ${entry.name.padEnd(width)}${suffix}`.trimEnd();

  return new OutputFormatter()
    .section(
      'Algorithms:',
      data.algorithms.map((entry) => row(entry, entry.hybrid ? 'hybrid' : ''))
    )
    .blank()
    .section(
      'Operations:',
      data.operations.map((entry) => row(entry))
    )
    .build();
}

/**
 * Register algorithms command
 */
export function registerAlgorithmsCommand(program: Command): void {
  program
    .command('algorithms')
    .description('List algorithm and operation tags with their wire values')
    .addOption(jsonOption)
    .action((options: BaseCommandOptions) => {
      runCommand(listTags, options, formatTags);
    });
}
