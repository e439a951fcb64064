/**
 * Centralized configuration constants for mixcast.
 *
 * Network endpoints, timing and limits used by the server, the client and the
 * CLI. Environment overrides are read through the getters at the bottom.
 */

// ============================================================================
// NETWORK ENDPOINTS
// ============================================================================

/**
 * Loopback address both listeners bind to by default.
 */
export const DEFAULT_HOST = '127.0.0.1';

/**
 * Reliable (TCP) command port.
 */
export const DEFAULT_TCP_PORT = 9877;

/**
 * Lossy (UDP) command port. Sits next to the TCP port.
 */
export const DEFAULT_UDP_PORT = 9878;

// ============================================================================
// RELIABLE CHANNEL TIMING
// ============================================================================

/**
 * How long a connection may sit without sending its next request before the
 * server closes it.
 */
export const RELIABLE_IDLE_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Upper bound on waiting for the Serializer to finish one command. On expiry
 * the caller gets an error response; the command itself still runs.
 */
export const COMMAND_TIMEOUT_MS = 10_000;

/**
 * Upper bound on flushing one response to a slow reader.
 */
export const RESPONSE_WRITE_TIMEOUT_MS = 15_000;

/**
 * Client-side bound on one `call` round trip (connect + write + read).
 */
export const CALL_TIMEOUT_MS = 15_000;

// ============================================================================
// LIMITS
// ============================================================================

/**
 * Largest request frame accepted on the reliable channel (16MB).
 * Responses are not limited on the client side.
 */
export const MAX_FRAME_BYTES = 16 * 1024 * 1024;

/**
 * Largest payload that fits in one UDP datagram over IPv4.
 */
export const MAX_DATAGRAM_BYTES = 65_507;

/**
 * Default number of commands the Serializer holds before rejecting new ones.
 */
export const DEFAULT_QUEUE_CAPACITY = 1024;

// ============================================================================
// ENVIRONMENT OVERRIDES
// ============================================================================

/**
 * Environment variables the CLI reads option defaults from. Values go through
 * the same validation as the flags.
 */
export const ENV = {
  HOST: 'MIXCAST_HOST',
  TCP_PORT: 'MIXCAST_TCP_PORT',
  UDP_PORT: 'MIXCAST_UDP_PORT',
  CALL_TIMEOUT_MS: 'MIXCAST_CALL_TIMEOUT_MS',
  QUEUE_CAPACITY: 'MIXCAST_QUEUE_CAPACITY',
} as const;

/**
 * Largest call timeout accepted from a flag or the environment.
 */
export const MAX_CALL_TIMEOUT_MS = 600_000;

/**
 * Call timeout for clients built without an explicit one.
 *
 * @throws Error when MIXCAST_CALL_TIMEOUT_MS is set but not an integer in 1..600000
 */
export function getCallTimeout(): number {
  const raw = process.env[ENV.CALL_TIMEOUT_MS];
  if (raw === undefined || raw.trim() === '') {
    return CALL_TIMEOUT_MS;
  }
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_CALL_TIMEOUT_MS) {
    throw new Error(
      `${ENV.CALL_TIMEOUT_MS} must be an integer from 1 to ${MAX_CALL_TIMEOUT_MS}, got "${raw}"`
    );
  }
  return parsed;
}
