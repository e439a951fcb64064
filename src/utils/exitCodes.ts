/**
 * Semantic exit codes for the mixcast CLI.
 *
 * Ranges:
 * - **0**: Success
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, unreachable server, rejected command)
 * - **100-119**: Software errors (timeouts, protocol violations, bugs)
 *
 * Values are stable; new codes may be added inside the existing ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Server not reachable (refused, not listening) */
  RESOURCE_NOT_FOUND: 83,

  /** Address already in use when starting the server */
  RESOURCE_BUSY: 85,

  /** Server answered with an error response */
  COMMAND_FAILED: 87,

  // Software Errors (100-119)

  /** Connection to the server failed mid-request */
  CONNECTION_FAILURE: 101,

  /** Request timed out */
  REQUEST_TIMEOUT: 102,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;
