/**
 * Structured client error classes.
 *
 * Transport errors mean the request may or may not have run; the connection
 * is discarded and the next call reconnects. A command error means the server
 * answered, and the connection is still good.
 */

import type { ErrorCode } from '@/protocol/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

/**
 * Base class for all client-side errors.
 *
 * Carries the exit code the CLI uses when the error reaches it.
 */
export class DispatchClientError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.SOFTWARE_ERROR) {
    super(message);
    this.name = 'DispatchClientError';
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DispatchClientError);
    }
  }
}

/**
 * Connection-level failure. The client never retries these.
 */
export class DispatchTransportError extends DispatchClientError {
  public override readonly name: string = 'DispatchTransportError';
  public readonly commandName: string;

  constructor(commandName: string, message: string, exitCode: number) {
    super(message, exitCode);
    this.commandName = commandName;
  }
}

/**
 * Could not connect, or the socket failed mid-request.
 *
 * @example
 * ```typescript
 * throw new DispatchConnectionError('get_info', '127.0.0.1:9877', new Error('connect ECONNREFUSED'));
 * ```
 */
export class DispatchConnectionError extends DispatchTransportError {
  public override readonly name = 'DispatchConnectionError';
  public readonly endpoint: string;
  public readonly code?: string;

  constructor(commandName: string, endpoint: string, cause: unknown) {
    const code = getErrorCode(cause);
    const message = [
      `${commandName} connection error`,
      `Endpoint: ${endpoint}`,
      ...(code ? [`Code: ${code}`] : []),
      `Details: ${getErrorMessage(cause)}`,
    ].join(' | ');
    super(
      commandName,
      message,
      code === 'ECONNREFUSED' ? EXIT_CODES.RESOURCE_NOT_FOUND : EXIT_CODES.CONNECTION_FAILURE
    );
    this.endpoint = endpoint;
    if (code !== undefined) {
      this.code = code;
    }
  }
}

/**
 * No response within the call timeout.
 */
export class DispatchTimeoutError extends DispatchTransportError {
  public override readonly name = 'DispatchTimeoutError';
  public readonly timeoutMs: number;

  constructor(commandName: string, timeoutMs: number) {
    super(
      commandName,
      `${commandName} request timeout after ${timeoutMs / 1000}s`,
      EXIT_CODES.REQUEST_TIMEOUT
    );
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The response was not valid JSON, not a dispatch response, or answered a
 * different request.
 */
export class DispatchParseError extends DispatchTransportError {
  public override readonly name = 'DispatchParseError';

  constructor(commandName: string, message: string, cause?: unknown) {
    super(commandName, `Failed to parse ${commandName} response: ${message}`, EXIT_CODES.SOFTWARE_ERROR);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * The server closed the connection before answering.
 */
export class DispatchEarlyCloseError extends DispatchTransportError {
  public override readonly name = 'DispatchEarlyCloseError';

  constructor(commandName: string) {
    super(
      commandName,
      `Connection closed before ${commandName} response received`,
      EXIT_CODES.CONNECTION_FAILURE
    );
  }
}

/**
 * The server answered with an error response.
 *
 * @example
 * ```typescript
 * try {
 *   await client.call('get_track_info', { track_index: 99 });
 * } catch (error) {
 *   if (error instanceof DispatchCommandError) {
 *     console.log(error.code, error.message); // HANDLER_ERROR Track index out of range
 *   }
 * }
 * ```
 */
export class DispatchCommandError extends DispatchClientError {
  public override readonly name = 'DispatchCommandError';
  public readonly commandName: string;
  public readonly code: ErrorCode;

  constructor(commandName: string, message: string, code: ErrorCode) {
    super(message, EXIT_CODES.COMMAND_FAILED);
    this.commandName = commandName;
    this.code = code;
  }
}

/**
 * True for failures that mean the server could not be reached at all.
 */
export function isConnectionError(error: unknown): error is DispatchConnectionError {
  return error instanceof DispatchConnectionError;
}
