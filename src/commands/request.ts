import type { Command } from 'commander';

import type { BaseCommandOptions, CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  algorithmOption,
  bodyOption,
  dataLenOption,
  identifierOption,
  jsonOption,
  operationOption,
} from '@/commands/shared/commonOptions.js';
import { parseHexBytes } from '@/commands/shared/parsers.js';
import {
  deserializeRequestHeader,
  getSerializedRequestHeaderSize,
  serializeRequest,
  serializeRequestHeader,
} from '@/framing/codec/index.js';
import {
  algorithmName,
  operationName,
  STATUS,
  type Algorithm,
  type Operation,
} from '@/framing/protocol/index.js';
import { CommandError, codecError } from '@/ui/errors/index.js';
import { formatHex, joinLines, OutputFormatter } from '@/ui/formatting.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import type { EncodedFrame } from './types.js';

/**
 * Flags consumed by `pqframe request encode`.
 */
export interface RequestEncodeOptions extends BaseCommandOptions {
  id: bigint;
  algorithm: Algorithm;
  operation: Operation;
  /** Body length to announce when no body is given */
  dataLen?: number;
  /** Body appended after the header */
  body?: Uint8Array;
}

export interface RequestDecodeOptions extends BaseCommandOptions {
  bytes: Uint8Array;
}

export interface DecodedRequest {
  version: number;
  identifier: bigint;
  dataLen: number;
  algorithm: string;
  operation: string;
  /** Body bytes present after the header, at most dataLen of them */
  body: string;
  /** Whether all dataLen body bytes were present */
  complete: boolean;
}

/**
 * Encode a request header, with the body behind it when one is given.
 */
export function encodeRequest(options: RequestEncodeOptions): CommandResult<EncodedFrame> {
  const headerSize = getSerializedRequestHeaderSize();

  if (options.body) {
    if (options.dataLen !== undefined && options.dataLen !== options.body.length) {
      throw new CommandError(
        `--data-len ${options.dataLen} does not match the ${options.body.length}-byte body`,
        { suggestion: 'Drop --data-len; it is taken from --body' },
        EXIT_CODES.INVALID_ARGUMENTS
      );
    }
    const result = serializeRequest(options.id, options.algorithm, options.operation, options.body);
    if (result.status !== STATUS.OK) {
      throw codecError('serializeRequest', result.status);
    }
    return {
      success: true,
      data: { hex: formatHex(result.bytes), size: result.bytes.length, headerSize },
    };
  }

  const header = new Uint8Array(headerSize);
  const status = serializeRequestHeader(
    options.id,
    options.dataLen ?? 0,
    options.algorithm,
    options.operation,
    header
  );
  if (status !== STATUS.OK) {
    throw codecError('serializeRequestHeader', status);
  }
  return { success: true, data: { hex: formatHex(header), size: headerSize, headerSize } };
}

/**
 * Decode a request header and report the body that follows it.
 */
export function decodeRequest(options: RequestDecodeOptions): CommandResult<DecodedRequest> {
  const result = deserializeRequestHeader(options.bytes);
  if (result.status !== STATUS.OK) {
    throw codecError('deserializeRequestHeader', result.status);
  }

  const { header } = result;
  const start = getSerializedRequestHeaderSize();
  const body = options.bytes.subarray(start, start + header.dataLen);
  return {
    success: true,
    data: {
      version: header.version,
      identifier: header.identifier,
      dataLen: header.dataLen,
      algorithm: algorithmName(header.algorithm),
      operation: operationName(header.operation),
      body: formatHex(body),
      complete: body.length === header.dataLen,
    },
  };
}

export function formatDecodedRequest(data: DecodedRequest): string {
  const fields = new OutputFormatter()
    .keyValueList([
      ['Version', String(data.version)],
      ['Identifier', data.identifier.toString()],
      ['Algorithm', data.algorithm],
      ['Operation', data.operation],
      ['Data length', String(data.dataLen)],
      ['Body', data.body === '' ? '(none)' : data.body],
    ])
    .build();
  return joinLines(fields, !data.complete && 'Warning: body is shorter than the announced data length');
}

export function formatEncodedFrame(data: EncodedFrame): string {
  return data.hex;
}

/**
 * Register request commands
 */
export function registerRequestCommands(program: Command): void {
  const request = program.command('request').description('Encode or decode request headers');

  request
    .command('encode')
    .description('Serialize a request header (and optional body) as hex')
    .addOption(identifierOption())
    .addOption(algorithmOption())
    .addOption(operationOption())
    .addOption(dataLenOption())
    .addOption(bodyOption('Body bytes as hex; sets the data length'))
    .addOption(jsonOption)
    .action((options: RequestEncodeOptions) => {
      runCommand(encodeRequest, options, formatEncodedFrame);
    });

  request
    .command('decode')
    .description('Deserialize a request header from hex')
    .argument('<hex>', 'Request bytes as hex', (value: string) => parseHexBytes(value))
    .addOption(jsonOption)
    .action((bytes: Uint8Array, options: BaseCommandOptions) => {
      runCommand(decodeRequest, { ...options, bytes }, formatDecodedRequest);
    });
}
