/**
 * Built-in coercer tests.
 */

import { describe, expect, it } from 'vitest';
import { bool, float, int, matching, oneOf } from '../../../src/params/coerce.js';
import { InvalidInputError } from '../../../src/params/errors.js';

describe('int', () => {
  it('parses decimal integers', () => {
    expect(int('1234')).toBe(1234);
    expect(int('-7')).toBe(-7);
    expect(int('+3')).toBe(3);
  });

  it('rejects non-integers with InvalidInputError', () => {
    expect(() => int('abc')).toThrow(InvalidInputError);
    expect(() => int('1.5')).toThrow(InvalidInputError);
    expect(() => int(' 1')).toThrow(InvalidInputError);
    expect(() => int('')).toThrow(InvalidInputError);
  });

  it('rejects integers beyond the safe range', () => {
    expect(() => int('90071992547409930')).toThrow('Integer out of range');
  });

  it('keeps the raw value on the error', () => {
    try {
      int('abc');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.raw).toBe('abc');
        expect(error.message).toBe("Expected an integer, got 'abc'");
      }
    }
  });
});

describe('float', () => {
  it('parses decimal numbers', () => {
    expect(float('1.5')).toBe(1.5);
    expect(float('.25')).toBe(0.25);
    expect(float('2e3')).toBe(2000);
  });

  it('rejects NaN and Infinity spellings', () => {
    expect(() => float('NaN')).toThrow(InvalidInputError);
    expect(() => float('Infinity')).toThrow(InvalidInputError);
    expect(() => float('1e400')).toThrow('Number out of range');
  });
});

describe('bool', () => {
  it('accepts the usual spellings case-insensitively', () => {
    expect(bool('1')).toBe(true);
    expect(bool('TRUE')).toBe(true);
    expect(bool('on')).toBe(true);
    expect(bool('no')).toBe(false);
    expect(bool('off')).toBe(false);
  });

  it('rejects anything else', () => {
    expect(() => bool('maybe')).toThrow("Expected a boolean, got 'maybe'");
  });
});

describe('oneOf', () => {
  const order = oneOf('asc', 'desc');

  it('returns an allowed value', () => {
    expect(order('desc')).toBe('desc');
  });

  it('lists the allowed values when rejecting', () => {
    expect(() => order('up')).toThrow("Expected one of asc, desc, got 'up'");
  });
});

describe('matching', () => {
  it('matches the whole value', () => {
    const slug = matching(/[a-z]+/);
    expect(slug('abc')).toBe('abc');
    expect(() => slug('abc1')).toThrow(InvalidInputError);
  });

  it('ignores the global flag', () => {
    const slug = matching(/[a-z]+/g);
    expect(slug('abc')).toBe('abc');
    expect(slug('abc')).toBe('abc');
  });

  it('gives the same answer on every call with a sticky pattern', () => {
    const slug = matching(/[a-z]+/y);
    expect(slug('abc')).toBe('abc');
    expect(slug('abc')).toBe('abc');
    expect(slug('xyz')).toBe('xyz');
  });

  it('keeps flags other than global and sticky', () => {
    const slug = matching(/[a-z]+/iy);
    expect(slug('ABC')).toBe('ABC');
    expect(slug('ABC')).toBe('ABC');
  });
});
