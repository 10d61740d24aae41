import type { Command } from 'commander';

import type { BaseCommandOptions, CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { ENTRY_LENGTH_FIELD_WIDTH, FORMAT_VERSION } from '@/constants.js';
import {
  ENTRIES_PREFIX_SIZE,
  getSerializedRequestHeaderSize,
  getSerializedResponseHeaderSize,
} from '@/framing/codec/index.js';
import { OutputFormatter } from '@/ui/formatting.js';

export interface WireSizes {
  formatVersion: number;
  requestHeaderSize: number;
  responseHeaderSize: number;
  entryLengthFieldWidth: number;
  entriesPrefixSize: number;
}

/**
 * Report the fixed sizes of the wire format.
 */
export function reportSizes(_options: BaseCommandOptions): CommandResult<WireSizes> {
  return {
    success: true,
    data: {
      formatVersion: FORMAT_VERSION,
      requestHeaderSize: getSerializedRequestHeaderSize(),
      responseHeaderSize: getSerializedResponseHeaderSize(),
      entryLengthFieldWidth: ENTRY_LENGTH_FIELD_WIDTH,
      entriesPrefixSize: ENTRIES_PREFIX_SIZE,
    },
  };
}

export function formatSizes(data: WireSizes): string {
  return new OutputFormatter()
    .keyValueList([
      ['Format version', String(data.formatVersion)],
      ['Request header', `${data.requestHeaderSize} bytes`],
      ['Response header', `${data.responseHeaderSize} bytes`],
      ['Entry length field', `${data.entryLengthFieldWidth} bytes (u64 LE)`],
      ['Entries prefix', `${data.entriesPrefixSize} bytes`],
    ])
    .build();
}

/**
 * Register sizes command
 */
export function registerSizesCommand(program: Command): void {
  program
    .command('sizes')
    .description('Show header sizes and the format version')
    .addOption(jsonOption)
    .action((options: BaseCommandOptions) => {
      runCommand(reportSizes, options, formatSizes);
    });
}
