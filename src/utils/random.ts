/**
 * Seeded pseudo-random number generator.
 * xoshiro128** with state expanded from the seed by SplitMix32, so a
 * game replays exactly from its command-line seed.
 */
export class SeededRandom {
  private readonly state = new Uint32Array(4);
  readonly seed: number;

  constructor(seed: number) {
    if (!Number.isFinite(seed)) {
      throw new RangeError(`Seed must be a finite number, got ${seed}`);
    }
    this.seed = seed;

    let s = seed >>> 0;
    for (let i = 0; i < this.state.length; i++) {
      s = (s + 0x9e3779b9) >>> 0;
      let z = Math.imul(s ^ (s >>> 16), 0x21f0aaad);
      z = Math.imul(z ^ (z >>> 15), 0x735a2d97);
      this.state[i] = (z ^ (z >>> 15)) >>> 0;
    }
    if (this.state.every(word => word === 0)) {
      this.state[0] = 1;
    }
  }

  /** Float in [0, 1). */
  random(): number {
    const s = this.state;
    const result = Math.imul(rotl(Math.imul(s[1], 5), 7), 9) >>> 0;
    const t = s[1] << 9;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];
    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result / 0x100000000;
  }

  /** Integer in [0, max). */
  randomInt(max: number): number {
    return Math.floor(this.random() * max);
  }

  /**
   * Fisher-Yates shuffle into a new array.
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.randomInt(i + 1);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }

  choice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot choose from an empty list');
    }
    return items[this.randomInt(items.length)];
  }
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}
