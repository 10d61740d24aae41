/**
 * Conversion from codec status codes to CLI errors.
 */

import { FORMAT_VERSION } from '@/constants.js';
import {
  describeStatus,
  getStatusName,
  STATUS,
  type FailureStatus,
} from '@/framing/protocol/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import { CommandError } from './CommandError.js';

/**
 * Exit code a CLI run ends with when the codec rejects its input.
 */
export function exitCodeForStatus(status: FailureStatus): number {
  switch (status) {
    case STATUS.VERSION_MISMATCH:
      return EXIT_CODES.VERSION_MISMATCH;
    case STATUS.ENCODING_ERROR:
    case STATUS.LENGTH_OVERFLOW:
    case STATUS.NULL_BUFFER:
    case STATUS.NULL_ENTRY1:
    case STATUS.NULL_ENTRY2:
      return EXIT_CODES.INVALID_ARGUMENTS;
    default:
      return EXIT_CODES.FRAME_REJECTED;
  }
}

/**
 * Build a CommandError for a failed codec call.
 *
 * @example
 * ```typescript
 * const result = destructure(bytes);
 * if (result.status !== STATUS.OK) {
 *   throw codecError('destructure', result.status);
 * }
 * ```
 */
export function codecError(operation: string, status: FailureStatus): CommandError {
  const metadata =
    status === STATUS.VERSION_MISMATCH
      ? { note: `This build speaks format version ${FORMAT_VERSION}` }
      : {};
  return new CommandError(
    `${operation} failed with ${getStatusName(status)} (${status}): ${describeStatus(status)}`,
    { ...metadata, context: { status: String(status) } },
    exitCodeForStatus(status)
  );
}
