import { CommandError, getErrorMessage } from '@/ui/errors/index.js';
import { genericError } from '@/ui/messages/errors.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Standard options supported by CommandRunner.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 * Handlers report failure by throwing a CommandError.
 */
export interface CommandResult<T = unknown> {
  success: true;
  /** Data to output */
  data: T;
}

/**
 * Handler function type.
 * Handlers are synchronous: nothing in pqframe waits on I/O.
 */
export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => CommandResult<TResult>;

/**
 * Formatter for human-readable output.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * Serialize command data for --json, writing bigint values as decimal strings.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, item: unknown) => (typeof item === 'bigint' ? item.toString() : item),
    2
  );
}

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * - Catches CommandError and reports its metadata and exit code
 * - Formats output as JSON or human-readable based on --json
 * - Calls process.exit() with the resulting exit code
 *
 * @example
 * ```typescript
 * runCommand((opts) => ({ success: true, data: decode(opts.hex) }), options, formatDecoded);
 * ```
 */
export function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): void {
  try {
    const result = handler(options);

    if (options.json) {
      console.log(toJson(OutputBuilder.buildJsonSuccess({ data: result.data })));
    } else if (formatter) {
      console.log(formatter(result.data));
    } else {
      console.log(toJson(result.data));
    }

    process.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    if (error instanceof CommandError) {
      if (options.json) {
        console.log(
          toJson(
            OutputBuilder.buildJsonError(error.message, {
              exitCode: error.exitCode,
              ...error.metadata,
            })
          )
        );
      } else {
        console.error(genericError(error.message));
        if (error.metadata.suggestion) console.error(error.metadata.suggestion);
        if (error.metadata.note) console.error(error.metadata.note);
      }
      process.exit(error.exitCode);
    }

    const errorMessage = getErrorMessage(error);
    if (options.json) {
      console.log(toJson(OutputBuilder.buildJsonError(errorMessage)));
    } else {
      console.error(genericError(errorMessage));
    }
    process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
  }
}
