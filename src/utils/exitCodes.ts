/**
 * Semantic exit codes for the pqframe CLI.
 *
 * **STABILITY: these exit codes are part of the stable CLI surface.**
 *
 * - **0**: success
 * - **1**: generic failure
 * - **80-99**: user errors (invalid arguments, malformed input)
 * - **100-119**: software errors (unhandled exceptions)
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Input bytes are not valid hex or exceed the configured limit */
  INVALID_INPUT: 87,

  /** Input bytes were rejected by the codec */
  FRAME_REJECTED: 88,

  /** Header carries a protocol version this build does not speak */
  VERSION_MISMATCH: 89,

  // Software Errors (100-119)

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
