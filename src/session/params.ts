/**
 * Typed readers for command parameters.
 *
 * Missing parameters fall back to the given default; present parameters of the
 * wrong type raise a TypeError, which reaches the caller as a handler error.
 */

import type { CommandParams } from '@/protocol/index.js';

export function readInt(params: CommandParams, key: string, fallback: number): number {
  const value = params[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new TypeError(`Parameter '${key}' must be an integer`);
  }
  return value;
}

export function readNumber(params: CommandParams, key: string, fallback: number): number {
  const value = params[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new TypeError(`Parameter '${key}' must be a number`);
  }
  return value;
}

export function readBoolean(params: CommandParams, key: string, fallback: boolean): boolean {
  const value = params[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new TypeError(`Parameter '${key}' must be a boolean`);
  }
  return value;
}

export function readString(params: CommandParams, key: string, fallback: string): string {
  const value = params[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new TypeError(`Parameter '${key}' must be a string`);
  }
  return value;
}

/**
 * Throw a RangeError unless `min <= value <= max`.
 */
export function assertRange(label: string, value: number, min: number, max: number): void {
  if (value < min || value > max) {
    throw new RangeError(`${label} must be between ${min} and ${max}`);
  }
}
