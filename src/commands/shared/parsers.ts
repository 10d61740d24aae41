/**
 * Argument parsers for pqframe commands.
 *
 * Each parser either returns a value the codec accepts or throws a
 * CommandError with INVALID_ARGUMENTS / INVALID_INPUT, so commander reports
 * bad input before any handler runs.
 */

import { getMaxInputBytes, MAX_DATA_LEN, MAX_IDENTIFIER } from '@/constants.js';
import {
  parseAlgorithm,
  parseOperation,
  type Algorithm,
  type Operation,
} from '@/framing/protocol/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { listTagsSuggestion, unknownTagError } from '@/ui/messages/errors.js';
import {
  inputTooLargeError,
  invalidHexError,
  invalidIntegerError,
} from '@/ui/messages/validation.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const DECIMAL_PATTERN = /^\d+$/;
const HEX_INTEGER_PATTERN = /^0x[0-9a-f]+$/i;
const HEX_BYTES_PATTERN = /^(?:[0-9a-f]{2})*$/i;

/**
 * Parse a u64 identifier given in decimal or 0x-prefixed hex.
 *
 * @example
 * ```typescript
 * parseIdentifier('42')     // 42n
 * parseIdentifier('0x04d2') // 1234n
 * ```
 */
export function parseIdentifier(value: string): bigint {
  const trimmed = value.trim();
  if (DECIMAL_PATTERN.test(trimmed) || HEX_INTEGER_PATTERN.test(trimmed)) {
    const parsed = BigInt(trimmed);
    if (parsed <= MAX_IDENTIFIER) {
      return parsed;
    }
  }
  throw new CommandError(
    invalidIntegerError('identifier', value, { min: 0, max: MAX_IDENTIFIER }),
    {},
    EXIT_CODES.INVALID_ARGUMENTS
  );
}

/**
 * Parse a u32 body length.
 */
export function parseDataLen(value: string): number {
  const trimmed = value.trim();
  if (DECIMAL_PATTERN.test(trimmed)) {
    const parsed = Number(trimmed);
    if (parsed <= MAX_DATA_LEN) {
      return parsed;
    }
  }
  throw new CommandError(
    invalidIntegerError('data-len', value, { min: 0, max: MAX_DATA_LEN }),
    {},
    EXIT_CODES.INVALID_ARGUMENTS
  );
}

/**
 * Parse a signed 8-bit response status.
 */
export function parseSuccess(value: string): number {
  const trimmed = value.trim();
  if (/^-?\d+$/.test(trimmed)) {
    const parsed = Number(trimmed);
    if (parsed >= -128 && parsed <= 127) {
      return parsed;
    }
  }
  throw new CommandError(
    invalidIntegerError('success', value, { min: -128, max: 127 }),
    {},
    EXIT_CODES.INVALID_ARGUMENTS
  );
}

export function parseAlgorithmArg(value: string): Algorithm {
  const algorithm = parseAlgorithm(value);
  if (algorithm === null) {
    throw new CommandError(
      unknownTagError('algorithm', value),
      { suggestion: listTagsSuggestion('algorithm') },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return algorithm;
}

export function parseOperationArg(value: string): Operation {
  const operation = parseOperation(value);
  if (operation === null) {
    throw new CommandError(
      unknownTagError('operation', value),
      { suggestion: listTagsSuggestion('operation') },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return operation;
}

/**
 * Decode hex input into bytes.
 *
 * Whitespace, colons and a leading 0x are ignored so that output of
 * `xxd -p`, `od` or this CLI can be pasted back in.
 *
 * @param fieldName - Argument name used in error messages
 */
export function parseHexBytes(value: string, fieldName: string = 'hex'): Uint8Array {
  const cleaned = value.replace(/^0x/i, '').replace(/[\s:]/g, '');
  if (!HEX_BYTES_PATTERN.test(cleaned)) {
    throw new CommandError(invalidHexError(fieldName), {}, EXIT_CODES.INVALID_INPUT);
  }

  const size = cleaned.length / 2;
  const limit = getMaxInputBytes();
  if (size > limit) {
    throw new CommandError(inputTooLargeError(fieldName, size, limit), {}, EXIT_CODES.INVALID_INPUT);
  }

  return new Uint8Array(Buffer.from(cleaned, 'hex'));
}
