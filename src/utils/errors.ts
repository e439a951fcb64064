/**
 * Error handling utilities.
 */

/**
 * Extract a message from an unknown thrown value.
 *
 * @example
 * ```typescript
 * try {
 *   session.invoke('delete_track', params);
 * } catch (error) {
 *   log.info(`delete_track failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Read the errno-style `code` of a Node system error, if it has one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
