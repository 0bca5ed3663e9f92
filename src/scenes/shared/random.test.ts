import { describe, it, expect } from 'vitest';
import { chance, createRandom, mulberry32, pick, randomInt, uniform } from './random';

describe('mulberry32', () => {
  it('replays the same sequence for the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    for (let i = 0; i < 20; i++) {
      expect(a()).toBe(b());
    }
  });

  it('differs between seeds', () => {
    const a = mulberry32(1);
    const b = mulberry32(2);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).not.toEqual(seqB);
  });

  it('stays in [0, 1)', () => {
    const random = mulberry32(7);
    for (let i = 0; i < 1000; i++) {
      const value = random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('createRandom', () => {
  it('falls back to Math.random without a seed', () => {
    expect(createRandom()).toBe(Math.random);
  });

  it('is deterministic with a seed', () => {
    expect(createRandom(9)()).toBe(mulberry32(9)());
  });
});

describe('uniform', () => {
  it('maps [0, 1) onto [min, max)', () => {
    expect(uniform(() => 0, 2, 4)).toBe(2);
    expect(uniform(() => 0.5, 2, 4)).toBe(3);
  });
});

describe('randomInt', () => {
  it('includes both ends', () => {
    expect(randomInt(() => 0, 70, 130)).toBe(70);
    expect(randomInt(() => 0.999999, 70, 130)).toBe(130);
  });
});

describe('pick', () => {
  it('selects by position', () => {
    expect(pick(() => 0, ['a', 'b', 'c'])).toBe('a');
    expect(pick(() => 0.99, ['a', 'b', 'c'])).toBe('c');
  });

  it('rejects an empty list', () => {
    expect(() => pick(() => 0, [])).toThrow(RangeError);
  });
});

describe('chance', () => {
  it('is true below the probability', () => {
    expect(chance(() => 0.54, 0.55)).toBe(true);
    expect(chance(() => 0.55, 0.55)).toBe(false);
  });
});
