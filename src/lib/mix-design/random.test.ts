import { describe, expect, it } from 'vitest';
import { InvalidMixInputError } from './errors';
import { createSeededRandom, defaultRandom, uniform } from './random';

const draw = (seed: number, count: number) => {
  const random = createSeededRandom(seed);
  return Array.from({ length: count }, () => random.next());
};

describe('createSeededRandom', () => {
  it('repeats the sequence for the same seed', () => {
    expect(draw(3, 10)).toEqual(draw(3, 10));
  });

  it('differs between seeds', () => {
    expect(draw(3, 5)).not.toEqual(draw(4, 5));
  });

  it('stays in [0, 1)', () => {
    for (const value of draw(11, 500)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('keeps drawing new values for the largest seed', () => {
    const [first, second] = draw(2 ** 32 - 1, 2);
    expect(second).not.toBe(first);
  });

  it('gives neighbouring seeds unrelated sequences', () => {
    const seven = draw(7, 4);
    const eight = draw(8, 4);
    for (const value of eight) {
      expect(seven).not.toContain(value);
    }
  });

  it('reads the seed as an unsigned 32-bit integer', () => {
    expect(draw(2 ** 32 + 5, 3)).toEqual(draw(5, 3));
  });

  it('rejects a non-finite seed', () => {
    expect(() => createSeededRandom(Number.NaN)).toThrow(InvalidMixInputError);
  });
});

describe('uniform', () => {
  it('scales the draw into the range', () => {
    expect(uniform({ next: () => 0.25 }, -10, 10)).toBe(-5);
    expect(uniform({ next: () => 0 }, 0, 2)).toBe(0);
  });

  it('works with the default source', () => {
    const value = uniform(defaultRandom, 5, 6);
    expect(value).toBeGreaterThanOrEqual(5);
    expect(value).toBeLessThan(6);
  });
});
