/**
 * Validation layer for command options and arguments.
 */

import type { CommandParams } from '@/protocol/index.js';
import { isRecord } from '@/protocol/index.js';
import { CommandError } from '@/ui/errors/index.js';
import { invalidIntegerError, invalidParamsError } from '@/ui/messages/validation.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base validation rule interface
 */
export interface ValidationRule<T> {
  validate: (value: unknown) => T;
}

export interface IntegerRuleOptions {
  /** Field name used in error messages and the example flag */
  name?: string;
  min?: number;
  max?: number;
  default?: number;
}

/**
 * Create an integer validation rule.
 *
 * @example
 * ```typescript
 * const port = positiveIntRule({ name: 'port', min: 0, max: 65535 }).validate('9877'); // 9877
 * ```
 */
export function positiveIntRule(options: IntegerRuleOptions = {}): ValidationRule<number> {
  const { name = 'value', min, max, default: defaultValue } = options;

  return {
    validate: (value: unknown): number => {
      if (value === undefined || value === null) {
        if (defaultValue !== undefined) {
          return defaultValue;
        }
        throw new CommandError(`${name} is required`, {}, EXIT_CODES.INVALID_ARGUMENTS);
      }

      if (typeof value !== 'string' && typeof value !== 'number') {
        throw new CommandError(
          `${name} must be a number, got ${typeof value}`,
          {},
          EXIT_CODES.INVALID_ARGUMENTS
        );
      }

      const strValue = String(value).trim();
      const parsed = Number(strValue);

      // Build error options conditionally to satisfy exactOptionalPropertyTypes
      const errorOptions: { min?: number; max?: number } = {};
      if (min !== undefined) errorOptions.min = min;
      if (max !== undefined) errorOptions.max = max;

      if (
        strValue === '' ||
        !Number.isInteger(parsed) ||
        (min !== undefined && parsed < min) ||
        (max !== undefined && parsed > max)
      ) {
        throw new CommandError(
          invalidIntegerError(name, strValue, errorOptions),
          {},
          EXIT_CODES.INVALID_ARGUMENTS
        );
      }

      return parsed;
    },
  };
}

/**
 * Parse the params argument of `call` and `cast`: a JSON object, or nothing.
 *
 * @throws CommandError when the text is not JSON or not an object
 *
 * @example
 * ```typescript
 * parseParams('{"track_index":0,"volume":0.5}'); // { track_index: 0, volume: 0.5 }
 * parseParams(undefined); // {}
 * ```
 */
export function parseParams(raw: string | undefined): CommandParams {
  if (raw === undefined || raw.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CommandError(invalidParamsError(reason), {}, EXIT_CODES.INVALID_ARGUMENTS);
  }

  if (!isRecord(parsed)) {
    throw new CommandError(
      invalidParamsError('expected a JSON object'),
      {},
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return parsed;
}
