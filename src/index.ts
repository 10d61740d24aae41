#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { CommandError } from '@/ui/errors/index.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { genericError } from '@/ui/messages/errors.js';
import { getErrorMessage, getExitCodeFromError } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

// Commander Configuration
const CLI_NAME = 'pqframe';
const CLI_DESCRIPTION = 'Inspect and produce post-quantum IPC frames as hex';

const log = createLogger('pqframe');

/**
 * Entry point.
 *
 * 1. Enable debug logging early when --debug is present
 * 2. Register every command on a fresh Commander program
 * 3. Parse arguments and route to the command; handlers exit the process themselves
 */
function main(): void {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  log.debug(`pqframe ${VERSION} starting`);

  try {
    program.parse();
  } catch (error) {
    // Argument parsers throw before any handler's runCommand can catch
    console.error(genericError(getErrorMessage(error)));
    if (error instanceof CommandError && error.metadata.suggestion) {
      console.error(error.metadata.suggestion);
    }
    process.exit(getExitCodeFromError(error, EXIT_CODES.INVALID_ARGUMENTS));
  }
}

main();
