/**
 * Validation error messages for command arguments.
 */

import { joinLines } from '@/ui/formatting.js';

/**
 * Options for integer validation error messages.
 */
export interface IntegerValidationOptions {
  /** Minimum allowed value */
  min?: bigint | number;
  /** Maximum allowed value */
  max?: bigint | number;
}

/**
 * Invalid integer error with its valid range.
 *
 * @example
 * ```typescript
 * invalidIntegerError('data-len', 'abc', { min: 0, max: 4294967295 });
 * ```
 */
export function invalidIntegerError(
  fieldName: string,
  value: string,
  options?: IntegerValidationOptions
): string {
  const header = `Invalid ${fieldName}: "${value}" is not a valid integer`;

  let rangeInfo: string | undefined;
  if (options?.min !== undefined && options?.max !== undefined) {
    rangeInfo = `Valid range: ${options.min} to ${options.max}`;
  } else if (options?.min !== undefined) {
    rangeInfo = `Must be at least ${options.min}`;
  } else if (options?.max !== undefined) {
    rangeInfo = `Must be at most ${options.max}`;
  }

  return joinLines(header, rangeInfo);
}

export function invalidHexError(fieldName: string): string {
  return `Invalid ${fieldName}: expected an even number of hex digits`;
}

export function inputTooLargeError(fieldName: string, size: number, limit: number): string {
  return `Invalid ${fieldName}: ${size} bytes exceeds the ${limit}-byte limit (PQFRAME_MAX_INPUT_BYTES)`;
}
