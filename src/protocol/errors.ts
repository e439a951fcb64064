/**
 * Dispatch error taxonomy.
 *
 * Every failure the server can report carries an `ErrorCode`. Reliable callers
 * see the code and message in the error response; failures on the lossy
 * channel are only logged.
 */

import type { Correlation, Transport } from './types.js';

export enum ErrorCode {
  /** Malformed JSON or a request that is not `{type, params}` */
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
  /** Command name not present in the registry */
  UNKNOWN_COMMAND = 'UNKNOWN_COMMAND',
  /** NeverLossy command received on the lossy channel */
  CLASSIFICATION_ERROR = 'CLASSIFICATION_ERROR',
  /** The Session API raised while executing the command */
  HANDLER_ERROR = 'HANDLER_ERROR',
  /** The command did not complete within the reliable channel's bound */
  COMMAND_TIMEOUT = 'COMMAND_TIMEOUT',
  /** The Serializer queue is at capacity */
  QUEUE_FULL = 'QUEUE_FULL',
  /** The Serializer no longer accepts work */
  SERVER_CLOSING = 'SERVER_CLOSING',
  /** Socket-level failure on one connection */
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
}

/**
 * Base class for all server-side dispatch failures.
 */
export class DispatchError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DispatchError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DispatchError);
    }
  }
}

/**
 * Payload could not be turned into a command, or names no registered command.
 * Detected before any handler runs.
 *
 * @example
 * ```typescript
 * throw new ProtocolError("Command is missing a string 'type' field");
 * throw ProtocolError.unknownCommand('set_volume');
 * ```
 */
export class ProtocolError extends DispatchError {
  public override readonly name = 'ProtocolError';
  public readonly correlation?: Correlation;

  constructor(
    message: string,
    code: ErrorCode.PROTOCOL_ERROR | ErrorCode.UNKNOWN_COMMAND = ErrorCode.PROTOCOL_ERROR,
    correlation?: Correlation
  ) {
    super(message, code);
    if (correlation !== undefined) {
      this.correlation = correlation;
    }
  }

  static unknownCommand(name: string, correlation?: Correlation): ProtocolError {
    return new ProtocolError(`Unknown command: ${name}`, ErrorCode.UNKNOWN_COMMAND, correlation);
  }
}

/**
 * Frame grew past the reliable channel's size limit. The connection that sent
 * it is closed after the error response.
 */
export class FrameTooLargeError extends ProtocolError {
  public readonly limit: number;

  constructor(limit: number) {
    super(`Request frame exceeds ${limit} bytes`);
    this.limit = limit;
  }
}

/**
 * A NeverLossy command arrived on the lossy channel. Never surfaced to a caller.
 */
export class ClassificationError extends DispatchError {
  public override readonly name = 'ClassificationError';
  public readonly commandName: string;
  public readonly transport: Transport;

  constructor(commandName: string, transport: Transport) {
    super(
      `Command ${commandName} is not eligible for the ${transport} transport`,
      ErrorCode.CLASSIFICATION_ERROR
    );
    this.commandName = commandName;
    this.transport = transport;
  }
}

/**
 * The Session API raised while executing a classified command. The message is
 * the host's own error message.
 */
export class HandlerError extends DispatchError {
  public override readonly name = 'HandlerError';
  public readonly commandName: string;

  constructor(commandName: string, message: string, cause: unknown) {
    super(message, ErrorCode.HANDLER_ERROR, { cause });
    this.commandName = commandName;
  }
}

/**
 * The command was accepted by the protocol but could not be run, or its
 * result could not be awaited: queue full, server closing, completion timeout.
 */
export class ExecutionError extends DispatchError {
  public override readonly name = 'ExecutionError';

  constructor(
    message: string,
    code: ErrorCode.QUEUE_FULL | ErrorCode.SERVER_CLOSING | ErrorCode.COMMAND_TIMEOUT
  ) {
    super(message, code);
  }
}

/**
 * Socket-level failure. Scoped to one connection; recovered by closing it.
 */
export class TransportError extends DispatchError {
  public override readonly name = 'TransportError';
  public readonly remote: string;

  constructor(remote: string, message: string, cause?: unknown) {
    super(`${remote}: ${message}`, ErrorCode.TRANSPORT_ERROR, { cause });
    this.remote = remote;
  }
}
