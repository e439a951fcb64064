/**
 * Dispatch protocol types.
 *
 * Shared by both listeners, the Serializer and the client. The wire shape is
 * identical on both transports; only the Reliable transport carries responses.
 */

import type { DispatchError, ErrorCode } from './errors.js';

/**
 * Which channel a command arrived on.
 */
export enum Transport {
  /** TCP stream: one request, exactly one response, same connection. */
  Reliable = 'reliable',
  /** UDP datagram: best effort, never answered. */
  Lossy = 'lossy',
}

/**
 * Opaque request identifier, echoed back on the matching response.
 */
export type Correlation = string | number;

export type CommandParams = Record<string, unknown>;

/**
 * A fully decoded command, ready for classification and execution.
 */
export interface Command {
  name: string;
  params: CommandParams;
  transport: Transport;
  correlation?: Correlation;
}

/**
 * Request as it appears on the wire.
 */
export interface WireRequest {
  type: string;
  params: CommandParams;
  id?: Correlation;
}

export interface SuccessResponse {
  status: 'success';
  result: unknown;
  id?: Correlation;
}

export interface ErrorResponse {
  status: 'error';
  message: string;
  code: ErrorCode;
  id?: Correlation;
}

/**
 * Reliable-channel response. Exactly one per request.
 */
export type DispatchResponse = SuccessResponse | ErrorResponse;

/**
 * Outcome of executing one command inside the Serializer.
 */
export type CommandResult = { ok: true; value: unknown } | { ok: false; error: DispatchError };

/**
 * Receives the result of a submitted command. Lossy submissions pass a no-op.
 */
export type CompletionHandler = (result: CommandResult) => void;
