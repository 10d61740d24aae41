/**
 * Field range checks and the shared rejection path.
 */

import { MAX_DATA_LEN, MAX_IDENTIFIER } from '@/constants.js';
import {
  failure,
  getStatusName,
  type Failure,
  type FailureStatus,
} from '@/framing/protocol/index.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('codec');

export function isU32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_DATA_LEN;
}

export function isI8(value: number): boolean {
  return Number.isInteger(value) && value >= -128 && value <= 127;
}

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= MAX_IDENTIFIER;
}

/**
 * Number of valid bytes in `source`.
 *
 * @param sourceLength - Valid leading bytes as declared by the caller; capped
 *   at `source.length` when larger
 * @returns The valid length, or null when `sourceLength` is negative or fractional
 */
export function validLength(source: Uint8Array, sourceLength?: number): number | null {
  if (sourceLength === undefined) {
    return source.length;
  }
  if (!Number.isSafeInteger(sourceLength) || sourceLength < 0) {
    return null;
  }
  return Math.min(sourceLength, source.length);
}

/**
 * Log a rejected operation and build its failure result.
 *
 * @param operation - Codec entry point that failed, e.g. `deserializeResponseHeader`
 * @param status - Failure status to return
 * @param detail - Extra context for the debug line
 */
export function reject(operation: string, status: FailureStatus, detail?: string): Failure {
  log.debug(`${operation} rejected: ${getStatusName(status)}${detail ? ` (${detail})` : ''}`);
  return failure(status);
}
