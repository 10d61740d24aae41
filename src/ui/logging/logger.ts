/**
 * Debug logging.
 *
 * Output goes to stderr so stdout stays clean for frame bytes and JSON, and
 * only when PQFRAME_DEBUG=1 is set or --debug is passed. The codec logs every
 * rejected decode here.
 */

import { DEBUG_ENV_VAR } from '@/constants.js';

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI start-up when --debug is present.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env[DEBUG_ENV_VAR] === '1';
}

/**
 * Log contexts, used as the message prefix.
 */
export type LogContext = 'pqframe' | 'codec';

// ============================================================================
// Logger
// ============================================================================

export interface Logger {
  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;
}

/**
 * Create a logger instance for a specific context.
 *
 * @example
 * ```typescript
 * const log = createLogger('codec');
 * log.debug('destructure rejected: OUT_OF_BOUNDS'); // only with --debug
 * ```
 */
export function createLogger(context: LogContext): Logger {
  return {
    debug: (message: string) => {
      if (isDebugEnabled()) {
        console.error(`[${context}] ${message}`);
      }
    },
  };
}
