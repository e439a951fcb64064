/**
 * Validation error messages.
 */

import { joinLines } from '@/ui/formatting.js';

export interface IntegerValidationOptions {
  min?: number;
  max?: number;
  /** Example valid value to show */
  exampleValue?: number;
}

/**
 * Invalid integer option, with the accepted range and an example.
 *
 * @example
 * ```typescript
 * invalidIntegerError('port', 'abc', { min: 1, max: 65535, exampleValue: 9877 });
 * // Invalid port: "abc" is not a valid integer
 * // Valid range: 1 to 65535
 * //
 * // Example: --port 9877
 * ```
 */
export function invalidIntegerError(
  fieldName: string,
  value: string,
  options?: IntegerValidationOptions
): string {
  const header = `Invalid ${fieldName}: "${value}" is not a valid integer`;

  let rangeInfo: string | undefined;
  if (options?.min !== undefined && options?.max !== undefined) {
    rangeInfo = `Valid range: ${options.min} to ${options.max}`;
  } else if (options?.min !== undefined) {
    rangeInfo = `Must be at least ${options.min}`;
  } else if (options?.max !== undefined) {
    rangeInfo = `Must be at most ${options.max}`;
  }

  const example = options?.exampleValue ?? options?.min ?? 1;

  return joinLines(header, rangeInfo, '', `Example: --${fieldName} ${example}`);
}

export function invalidParamsError(reason: string): string {
  return joinLines(
    `Invalid params: ${reason}`,
    '',
    `Example: mixcast call set_track_volume '{"track_index":0,"volume":0.5}'`
  );
}
