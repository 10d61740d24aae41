/**
 * Logging utilities for pqframe.
 */

export {
  createLogger,
  enableDebugLogging,
  type LogContext,
  type Logger,
} from './logger.js';
