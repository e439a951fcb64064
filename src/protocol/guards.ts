/**
 * Runtime guards and codecs for the dispatch wire format.
 */

import { ErrorCode, ProtocolError, type DispatchError } from './errors.js';
import type {
  Command,
  CommandParams,
  CommandResult,
  Correlation,
  DispatchResponse,
  Transport,
  WireRequest,
} from './types.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCorrelation(value: unknown): value is Correlation {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/**
 * Decode one framed request into a Command.
 *
 * @param text - One complete JSON document
 * @param transport - Channel the document arrived on
 * @throws ProtocolError for malformed JSON or a request of the wrong shape.
 *   The error carries the request `id` when one could be read.
 *
 * @example
 * ```typescript
 * decodeCommand('{"type":"get_info","params":{}}', Transport.Reliable);
 * // { name: 'get_info', params: {}, transport: 'reliable' }
 * ```
 */
export function decodeCommand(text: string, transport: Transport): Command {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProtocolError(`Invalid JSON: ${reason}`);
  }

  if (!isRecord(parsed)) {
    throw new ProtocolError('Command must be a JSON object');
  }

  const { type, params, id } = parsed;

  let correlation: Correlation | undefined;
  if (id !== undefined) {
    if (!isCorrelation(id)) {
      throw new ProtocolError("'id' must be a string or a number");
    }
    correlation = id;
  }
  if (typeof type !== 'string' || type.length === 0) {
    throw new ProtocolError(
      "Command is missing a string 'type' field",
      ErrorCode.PROTOCOL_ERROR,
      correlation
    );
  }
  if (params !== undefined && params !== null && !isRecord(params)) {
    throw new ProtocolError("'params' must be a JSON object", ErrorCode.PROTOCOL_ERROR, correlation);
  }

  const command: Command = {
    name: type,
    params: isRecord(params) ? params : {},
    transport,
  };
  if (correlation !== undefined) {
    command.correlation = correlation;
  }
  return command;
}

/**
 * Build the wire request for a command.
 */
export function encodeRequest(name: string, params: CommandParams, id?: Correlation): string {
  const request: WireRequest = { type: name, params };
  if (id !== undefined) {
    request.id = id;
  }
  return JSON.stringify(request);
}

/**
 * Build the response for a command result.
 */
export function toResponse(result: CommandResult, correlation?: Correlation): DispatchResponse {
  const response: DispatchResponse = result.ok
    ? { status: 'success', result: result.value ?? null }
    : errorResponse(result.error);
  if (correlation !== undefined) {
    response.id = correlation;
  }
  return response;
}

/**
 * Build the error response for a failure detected outside the Serializer.
 */
export function errorResponse(error: DispatchError, correlation?: Correlation): DispatchResponse {
  const response: DispatchResponse = { status: 'error', message: error.message, code: error.code };
  if (correlation !== undefined) {
    response.id = correlation;
  }
  return response;
}

/**
 * Serialize a response as one newline-terminated frame.
 */
export function encodeResponse(response: DispatchResponse): string {
  return JSON.stringify(response) + '\n';
}

const ERROR_CODES = new Set<string>(Object.values(ErrorCode));

function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && ERROR_CODES.has(value);
}

/**
 * Validate a decoded response document.
 *
 * Error responses from servers that send no `code` are read as HANDLER_ERROR.
 *
 * @returns The response, or null if the document is not a dispatch response
 */
export function readResponse(value: unknown): DispatchResponse | null {
  if (!isRecord(value)) {
    return null;
  }

  const id = isCorrelation(value['id']) ? value['id'] : undefined;

  if (value['status'] === 'success') {
    const response: DispatchResponse = { status: 'success', result: value['result'] ?? null };
    if (id !== undefined) {
      response.id = id;
    }
    return response;
  }

  if (value['status'] === 'error') {
    const message = value['message'];
    const code = value['code'];
    const response: DispatchResponse = {
      status: 'error',
      message: typeof message === 'string' ? message : 'Unknown error',
      code: isErrorCode(code) ? code : ErrorCode.HANDLER_ERROR,
    };
    if (id !== undefined) {
      response.id = id;
    }
    return response;
  }

  return null;
}
