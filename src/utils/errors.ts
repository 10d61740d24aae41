/**
 * Error handling utilities.
 */

/**
 * Extract an error message from an unknown thrown value.
 *
 * @example
 * ```typescript
 * try {
 *   program.parse();
 * } catch (error) {
 *   console.error(`Failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract an exit code from an error object, if it carries one.
 */
export function getExitCodeFromError(error: unknown, fallback: number): number {
  if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
    return error.exitCode;
  }
  return fallback;
}
