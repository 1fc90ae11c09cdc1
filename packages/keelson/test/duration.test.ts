import { describe, expect, it } from 'vitest';

import { formatDuration, HOUR, MILLISECOND, MINUTE, parseDuration, SECOND } from '../src/config/duration';

describe('parseDuration', () => {
  it.each([
    ['10m', 10 * MINUTE],
    ['1h30m', HOUR + 30 * MINUTE],
    ['1.5h', HOUR + 30 * MINUTE],
    ['300ms', 300 * MILLISECOND],
    ['-2s', -2 * SECOND],
    ['0', 0],
  ])('parses %s', (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it.each([
    ['', 'invalid duration ""'],
    ['abc', 'invalid duration "abc"'],
    ['10', 'missing unit in duration "10"'],
    ['10x', 'unknown unit "x" in duration "10x"'],
    ['10 minutes', 'invalid duration "10 minutes"'],
  ])('rejects %j', (input, message) => {
    expect(() => parseDuration(input)).toThrow(message);
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [10 * MINUTE, '10m0s'],
    [HOUR + 30 * MINUTE, '1h30m0s'],
    [1500 * MILLISECOND, '1.5s'],
    [300 * MILLISECOND, '300ms'],
  ])('formats %d as %s', (duration, expected) => {
    expect(formatDuration(duration)).toBe(expected);
  });
});
