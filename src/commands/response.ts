import { Option, type Command } from 'commander';

import type { BaseCommandOptions, CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { bodyOption, identifierOption, jsonOption } from '@/commands/shared/commonOptions.js';
import { parseHexBytes, parseSuccess } from '@/commands/shared/parsers.js';
import {
  deserializeResponse,
  getSerializedResponseHeaderSize,
  serializeResponse,
  serializeResponseHeader,
} from '@/framing/codec/index.js';
import { STATUS } from '@/framing/protocol/index.js';
import { CommandError, codecError } from '@/ui/errors/index.js';
import { formatHex, OutputFormatter } from '@/ui/formatting.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import { formatEncodedFrame } from './request.js';
import type { EncodedFrame } from './types.js';

/**
 * Flags consumed by `pqframe response encode`.
 */
export interface ResponseEncodeOptions extends BaseCommandOptions {
  id: bigint;
  /** Body for a successful response; omit for a failure */
  body?: Uint8Array;
  /** Explicit non-zero failure code instead of the default -1 */
  failCode?: number;
}

export interface ResponseDecodeOptions extends BaseCommandOptions {
  bytes: Uint8Array;
}

export interface DecodedResponse {
  version: number;
  identifier: bigint;
  success: number;
  dataLen: number;
  body: string;
}

/**
 * Encode a response: header plus body on success, header alone on failure.
 */
export function encodeResponse(options: ResponseEncodeOptions): CommandResult<EncodedFrame> {
  const headerSize = getSerializedResponseHeaderSize();

  if (options.failCode !== undefined) {
    if (options.failCode === 0 || options.body) {
      throw new CommandError(
        '--fail-code must be non-zero and cannot be combined with --body',
        {},
        EXIT_CODES.INVALID_ARGUMENTS
      );
    }
    const header = new Uint8Array(headerSize);
    const status = serializeResponseHeader(options.id, options.failCode, 0, header);
    if (status !== STATUS.OK) {
      throw codecError('serializeResponseHeader', status);
    }
    return { success: true, data: { hex: formatHex(header), size: headerSize, headerSize } };
  }

  const result = serializeResponse(options.id, options.body ?? null);
  if (result.status !== STATUS.OK) {
    throw codecError('serializeResponse', result.status);
  }
  return {
    success: true,
    data: { hex: formatHex(result.bytes), size: result.bytes.length, headerSize },
  };
}

/**
 * Decode a response header and the body it announces.
 */
export function decodeResponse(options: ResponseDecodeOptions): CommandResult<DecodedResponse> {
  const result = deserializeResponse(options.bytes);
  if (result.status !== STATUS.OK) {
    throw codecError('deserializeResponse', result.status);
  }

  const { header, body } = result.response;
  return {
    success: true,
    data: {
      version: header.version,
      identifier: header.identifier,
      success: header.success,
      dataLen: header.dataLen,
      body: formatHex(body),
    },
  };
}

export function formatDecodedResponse(data: DecodedResponse): string {
  const outcome = data.success === 0 ? 'success' : `failure (${data.success})`;
  return new OutputFormatter()
    .keyValueList([
      ['Version', String(data.version)],
      ['Identifier', data.identifier.toString()],
      ['Outcome', outcome],
      ['Data length', String(data.dataLen)],
      ['Body', data.body === '' ? '(none)' : data.body],
    ])
    .build();
}

/**
 * Register response commands
 */
export function registerResponseCommands(program: Command): void {
  const response = program.command('response').description('Encode or decode response headers');

  response
    .command('encode')
    .description('Serialize a response as hex (failure when no --body is given)')
    .addOption(identifierOption())
    .addOption(bodyOption('Body bytes as hex for a successful response'))
    .addOption(
      new Option('--fail-code <n>', 'Non-zero i8 failure code; emits a header only').argParser(
        parseSuccess
      )
    )
    .addOption(jsonOption)
    .action((options: ResponseEncodeOptions) => {
      runCommand(encodeResponse, options, formatEncodedFrame);
    });

  response
    .command('decode')
    .description('Deserialize a response header and its body from hex')
    .argument('<hex>', 'Response bytes as hex', (value: string) => parseHexBytes(value))
    .addOption(jsonOption)
    .action((bytes: Uint8Array, options: BaseCommandOptions) => {
      runCommand(decodeResponse, { ...options, bytes }, formatDecodedResponse);
    });
}
