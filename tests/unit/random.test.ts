/**
 * Unit tests for the seeded PRNG.
 */
import { describe, it, expect } from 'vitest';
import { SeededRandom } from '../../src/utils/random';

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = new SeededRandom(1234);
    const b = new SeededRandom(1234);
    for (let i = 0; i < 20; i++) {
      expect(a.random()).toBe(b.random());
    }
  });

  it('differs between seeds', () => {
    const first = new SeededRandom(1);
    const second = new SeededRandom(2);
    const left = Array.from({ length: 5 }, () => first.random());
    const right = Array.from({ length: 5 }, () => second.random());
    expect(left).not.toEqual(right);
  });

  it('stays within [0, 1)', () => {
    const rng = new SeededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng.random();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('shuffles into a new permutation', () => {
    const items = [1, 2, 3, 4, 5, 6, 7, 8, 9];
    const shuffled = new SeededRandom(99).shuffle(items);
    expect(shuffled).not.toBe(items);
    expect([...shuffled].sort((x, y) => x - y)).toEqual(items);
    expect(items).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('chooses from a list and refuses an empty one', () => {
    const rng = new SeededRandom(5);
    expect(['a', 'b', 'c']).toContain(rng.choice(['a', 'b', 'c']));
    expect(() => rng.choice([])).toThrow(RangeError);
  });

  it('rejects a non-finite seed', () => {
    expect(() => new SeededRandom(Number.NaN)).toThrow(RangeError);
  });
});
