import { DispatchClientError, DispatchCommandError } from '@/client/index.js';
import { CommandError, getErrorMessage, isConnectionError } from '@/ui/errors/index.js';
import { genericError, serverNotRunningError, unknownError } from '@/ui/messages/errors.js';
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
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  /** Data to output (for successful commands) */
  data?: T;
  /** Error message (for failed commands) */
  error?: string;
  /** Exit code override for failures */
  exitCode?: number;
}

export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formats successful data for humans.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Run a command with consistent error handling, output formatting and exit
 * codes.
 *
 * - Success prints `data` (JSON with --json, otherwise the formatter's text)
 * - CommandError prints its message and metadata, exits with its code
 * - Client errors exit with the code they carry; an unreachable server gets
 *   a dedicated message
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => ({ success: true, data: await client.call('get_info') }),
 *   options,
 *   formatValue
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): Promise<void> {
  try {
    const result = await handler(options);

    if (!result.success) {
      if (options.json) {
        printJson(OutputBuilder.buildJsonError(result.error ?? 'Unknown error'));
      } else {
        console.error(result.error ? genericError(result.error) : unknownError());
      }
      process.exit(result.exitCode ?? EXIT_CODES.UNHANDLED_EXCEPTION);
    }

    if (options.json || !formatter || result.data === undefined) {
      printJson(result.data ?? null);
    } else {
      console.log(formatter(result.data));
    }

    process.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    if (error instanceof CommandError) {
      if (options.json) {
        printJson(OutputBuilder.buildJsonError(error.message, { ...error.metadata }));
      } else {
        console.error(genericError(error.message));
        for (const value of Object.values(error.metadata)) {
          console.error(value);
        }
      }
      process.exit(error.exitCode);
    }

    if (isConnectionError(error) && error.code === 'ECONNREFUSED') {
      if (options.json) {
        printJson(
          OutputBuilder.buildJsonError('Server not running', {
            endpoint: error.endpoint,
            suggestion: 'Start it with: mixcast serve',
          })
        );
      } else {
        console.error(serverNotRunningError(error.endpoint));
      }
      process.exit(error.exitCode);
    }

    if (error instanceof DispatchCommandError) {
      if (options.json) {
        printJson(OutputBuilder.buildJsonError(error.message, { code: error.code }));
      } else {
        console.error(genericError(`${error.message} (${error.code})`));
      }
      process.exit(error.exitCode);
    }

    const exitCode =
      error instanceof DispatchClientError ? error.exitCode : EXIT_CODES.UNHANDLED_EXCEPTION;
    if (options.json) {
      printJson(OutputBuilder.buildJsonError(getErrorMessage(error)));
    } else {
      console.error(genericError(getErrorMessage(error)));
    }
    process.exit(exitCode);
  }
}
