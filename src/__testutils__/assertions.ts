/**
 * assertions - Custom assertion helpers for contract tests
 */

/**
 * Poll a condition until it becomes true or timeout
 * Useful for eventually-consistent assertions (datagrams, socket closes)
 *
 * @example
 * await assertEventually(() => session.count('set_track_volume') === 10, 1000);
 */
export async function assertEventually(
  fn: () => boolean,
  timeoutMs: number,
  message?: string
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  if (fn()) {
    return;
  }
  throw new Error(message ?? `Condition not met within ${timeoutMs}ms`);
}

/**
 * Resolve after `ms` milliseconds.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
