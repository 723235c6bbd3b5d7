import {
  describe,
  expect,
  it
} from 'vitest';

import {
  assertNonNullable,
  ensureNonNullable,
  isDigit,
  isRecord
} from '../src/typeGuards.ts';

describe('assertNonNullable', () => {
  it('passes for falsy but present values', () => {
    expect(() => {
      assertNonNullable(0);
    }).not.toThrow();
    expect(() => {
      assertNonNullable('');
    }).not.toThrow();
  });

  it('throws for null and undefined', () => {
    expect(() => {
      assertNonNullable(null);
    }).toThrow('Value is null');
    expect(() => {
      assertNonNullable(undefined);
    }).toThrow('Value is undefined');
  });

  it('throws the given Error', () => {
    const error = new TypeError('type error');
    expect(() => {
      assertNonNullable(null, error);
    }).toThrow(error);
  });
});

describe('ensureNonNullable', () => {
  it('returns the value', () => {
    expect(ensureNonNullable('A1')).toBe('A1');
  });

  it('throws with custom message', () => {
    expect(() => ensureNonNullable(new Map<string, number>().get('A1'), 'Unknown cell: A1')).toThrow('Unknown cell: A1');
  });
});

describe('isDigit', () => {
  it('accepts integers 1 through 9 only', () => {
    expect(isDigit(1)).toBe(true);
    expect(isDigit(9)).toBe(true);
    expect(isDigit(0)).toBe(false);
    expect(isDigit(10)).toBe(false);
    expect(isDigit(2.5)).toBe(false);
    expect(isDigit(Number.NaN)).toBe(false);
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({ grid: '.' })).toBe(true);
    expect(isRecord(null)).toBe(false);
    expect(isRecord(['grid'])).toBe(false);
    expect(isRecord('grid')).toBe(false);
  });
});
