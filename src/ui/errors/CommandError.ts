/**
 * Structured error handling for CLI commands.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Metadata that can be attached to command errors.
 */
export interface ErrorMetadata {
  /** User-facing suggestion for resolving the error */
  suggestion?: string;
  /** Technical note or additional context */
  note?: string;
  /** Additional contextual key-value pairs */
  context?: Record<string, string>;
}

/**
 * Error class for CLI commands with structured metadata and an exit code.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Unknown algorithm: RSA',
 *   { suggestion: 'List algorithms with: pqframe algorithms' },
 *   EXIT_CODES.INVALID_ARGUMENTS
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
