/**
 * Built-in coercers.
 *
 * Each coercer accepts the raw string taken from a path segment or a named
 * value and either returns a typed value or throws InvalidInputError.
 */

import type { Coercer } from './descriptor.js';
import { InvalidInputError } from './errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Decimal integer, optionally signed. Surrounding whitespace is not allowed.
 *
 * @example
 * int('1234'); // 1234
 * int('abc');  // throws InvalidInputError
 */
export const int: Coercer<number> = (raw) => {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new InvalidInputError(raw, `Expected an integer, got '${raw}'`);
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value)) {
    throw new InvalidInputError(raw, `Integer out of range: '${raw}'`);
  }
  return value;
};

/**
 * Decimal floating point number. `NaN` and `Infinity` are rejected.
 */
export const float: Coercer<number> = (raw) => {
  if (!FLOAT_PATTERN.test(raw)) {
    throw new InvalidInputError(raw, `Expected a number, got '${raw}'`);
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(raw, `Number out of range: '${raw}'`);
  }
  return value;
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Boolean flag. Accepts 1/0, true/false, yes/no, on/off (case-insensitive).
 */
export const bool: Coercer<boolean> = (raw) => {
  const normalized = raw.toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  throw new InvalidInputError(raw, `Expected a boolean, got '${raw}'`);
};

/**
 * One of a fixed set of strings.
 *
 * @example
 * const order = oneOf('asc', 'desc');
 * order('asc');  // 'asc'
 * order('up');   // throws InvalidInputError
 */
export function oneOf<V extends string>(...allowed: V[]): Coercer<V> {
  return (raw) => {
    for (const candidate of allowed) {
      if (candidate === raw) {
        return candidate;
      }
    }
    throw new InvalidInputError(raw, `Expected one of ${allowed.join(', ')}, got '${raw}'`);
  };
}

/**
 * String matching a regular expression in full.
 *
 * The pattern is anchored: `matching(/[a-z]+/)` rejects `'abc1'`. The
 * global and sticky flags are dropped so that `test` keeps no state between
 * calls.
 */
export function matching(pattern: RegExp): Coercer<string> {
  const anchored = new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gy]/g, ''));
  return (raw) => {
    if (!anchored.test(raw)) {
      throw new InvalidInputError(raw, `Value does not match ${pattern.source}: '${raw}'`);
    }
    return raw;
  };
}
