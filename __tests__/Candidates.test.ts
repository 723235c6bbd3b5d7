import {
  describe,
  expect,
  it
} from 'vitest';

import { Candidates } from '../src/Candidates.ts';

describe('Candidates', () => {
  it('keeps digits sorted and unique', () => {
    expect(Candidates.parse('931').toString()).toBe('139');
    expect(Candidates.of(5, 2, 5).toString()).toBe('25');
    expect(Candidates.of(5, 2, 5).size).toBe(2);
  });

  it('reports membership', () => {
    const candidates = Candidates.parse('139');
    expect(candidates.has(3)).toBe(true);
    expect(candidates.has(2)).toBe(false);
  });

  it('exposes the value of a solved set only', () => {
    expect(Candidates.parse('77').isSolved).toBe(true);
    expect(Candidates.parse('77').value).toBe(7);
    expect(Candidates.ALL.value).toBeNull();
    expect(Candidates.NONE.value).toBeNull();
  });

  it('treats the empty set as a contradiction marker', () => {
    expect(Candidates.NONE.isEmpty).toBe(true);
    expect(Candidates.parse('').equals(Candidates.NONE)).toBe(true);
    expect(Candidates.ALL.toString()).toBe('123456789');
  });

  it('rejects non-digit characters', () => {
    expect(() => Candidates.parse('12x')).toThrow('Expected digits 1-9: 12x');
    expect(() => Candidates.parse('0')).toThrow('Expected digits 1-9: 0');
  });

  it('removes digits with without', () => {
    expect(Candidates.parse('1234').without(Candidates.parse('24')).toString()).toBe('13');
    expect(Candidates.parse('5').without(Candidates.parse('5')).isEmpty).toBe(true);
  });

  it('returns the same instance when without removes nothing', () => {
    const candidates = Candidates.parse('1234');
    expect(candidates.without(Candidates.parse('89'))).toBe(candidates);
  });

  it('compares by content', () => {
    expect(Candidates.parse('21').equals(Candidates.of(1, 2))).toBe(true);
    expect(Candidates.parse('12').equals(Candidates.parse('123'))).toBe(false);
  });
});
