/**
 * JSON envelopes for `--json` output.
 */

import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Build a JSON error envelope.
   *
   * @example
   * ```typescript
   * OutputBuilder.buildJsonError('Unknown command: set_volume', { code: 'UNKNOWN_COMMAND' });
   * // { version: '0.3.0', success: false, error: 'Unknown command: set_volume', code: 'UNKNOWN_COMMAND' }
   * ```
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }
}
