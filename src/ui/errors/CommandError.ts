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
  /** Server error code, when the server rejected the command */
  code?: string;
}

/**
 * CLI error with metadata and a specific exit code.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'set_tempo cannot be sent over the lossy channel',
 *   { suggestion: 'Use: mixcast call set_tempo' },
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
