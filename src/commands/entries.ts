import type { Command } from 'commander';

import type { BaseCommandOptions, CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { parseDataLen, parseHexBytes } from '@/commands/shared/parsers.js';
import { destructure, structureEntries } from '@/framing/codec/index.js';
import { STATUS } from '@/framing/protocol/index.js';
import { codecError } from '@/ui/errors/index.js';
import { formatHex, OutputFormatter } from '@/ui/formatting.js';

import { formatEncodedFrame } from './request.js';
import type { EncodedFrame } from './types.js';

export interface StructureOptions extends BaseCommandOptions {
  entry1: Uint8Array;
  entry2: Uint8Array;
}

export interface DestructureOptions extends BaseCommandOptions {
  bytes: Uint8Array;
  /** Treat only this many leading bytes as valid */
  length?: number;
}

export interface DestructuredEntries {
  entry1: string;
  len1: number;
  entry2: string;
  len2: number;
}

/**
 * Pack two entries behind their length prefixes.
 */
export function structureCommand(options: StructureOptions): CommandResult<EncodedFrame> {
  const result = structureEntries(options.entry1, options.entry2);
  if (result.status !== STATUS.OK) {
    throw codecError('structure', result.status);
  }
  return {
    success: true,
    data: { hex: formatHex(result.buffer), size: result.buffer.length, headerSize: 0 },
  };
}

/**
 * Split a structured buffer into its two entries.
 */
export function destructureCommand(options: DestructureOptions): CommandResult<DestructuredEntries> {
  const result = destructure(options.bytes, options.length);
  if (result.status !== STATUS.OK) {
    throw codecError('destructure', result.status);
  }
  return {
    success: true,
    data: {
      entry1: formatHex(result.entry1),
      len1: result.entry1.length,
      entry2: formatHex(result.entry2),
      len2: result.entry2.length,
    },
  };
}

export function formatDestructured(data: DestructuredEntries): string {
  return new OutputFormatter()
    .keyValueList([
      [`Entry 1 (${data.len1})`, data.entry1 === '' ? '(empty)' : data.entry1],
      [`Entry 2 (${data.len2})`, data.entry2 === '' ? '(empty)' : data.entry2],
    ])
    .build();
}

/**
 * Register structured entries commands
 */
export function registerEntriesCommands(program: Command): void {
  const entries = program
    .command('entries')
    .description('Pack or unpack a length-prefixed pair of entries');

  entries
    .command('structure')
    .description('Pack two hex entries into one structured buffer')
    .argument('<entry1>', 'First entry as hex', (value: string) => parseHexBytes(value, 'entry1'))
    .argument('<entry2>', 'Second entry as hex', (value: string) => parseHexBytes(value, 'entry2'))
    .addOption(jsonOption)
    .action((entry1: Uint8Array, entry2: Uint8Array, options: BaseCommandOptions) => {
      runCommand(structureCommand, { ...options, entry1, entry2 }, formatEncodedFrame);
    });

  entries
    .command('destructure')
    .description('Unpack a structured buffer given as hex')
    .argument('<hex>', 'Structured bytes as hex', (value: string) => parseHexBytes(value))
    .option('--length <n>', 'Number of valid leading bytes', parseDataLen)
    .addOption(jsonOption)
    .action((bytes: Uint8Array, options: BaseCommandOptions & { length?: number }) => {
      runCommand(destructureCommand, { ...options, bytes }, formatDestructured);
    });
}
