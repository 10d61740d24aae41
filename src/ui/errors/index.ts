/**
 * Error handling for the pqframe CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';

export { codecError, exitCodeForStatus } from './utils.js';

export { getErrorMessage } from '@/utils/errors.js';
