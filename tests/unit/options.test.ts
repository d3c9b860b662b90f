/**
 * Unit tests for command-line value parsing.
 */
import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import {
  parseEngine,
  parseKillerCapacity,
  parsePlayouts,
  parseSeed,
  parseSide,
} from '../../src/utils/options';

describe('parseSeed', () => {
  it('accepts integers', () => {
    expect(parseSeed('42')).toBe(42);
    expect(parseSeed(' -3 ')).toBe(-3);
    expect(parseSeed('+7')).toBe(7);
  });

  it('rejects anything else as a usage error', () => {
    expect(() => parseSeed('abc')).toThrow(InvalidArgumentError);
    expect(() => parseSeed('')).toThrow(InvalidArgumentError);
    expect(() => parseSeed('1.5')).toThrow('Seed must be an integer, got "1.5".');
    expect(() => parseSeed('99999999999999999999')).toThrow('Seed is out of range');
  });
});

describe('parseSide', () => {
  it('normalizes symbols and names', () => {
    expect(parseSide('X')).toBe('maximizer');
    expect(parseSide('o')).toBe('minimizer');
    expect(parseSide('Minimizer')).toBe('minimizer');
  });

  it('rejects unknown sides', () => {
    expect(() => parseSide('z')).toThrow('Unknown side: "z". Use x or o.');
  });
});

describe('parseEngine', () => {
  it('accepts known engines in any case', () => {
    expect(parseEngine('Rollout')).toBe('rollout');
    expect(parseEngine('alphabeta')).toBe('alphabeta');
  });

  it('rejects unknown engines', () => {
    expect(() => parseEngine('negamax')).toThrow(InvalidArgumentError);
  });
});

describe('integer options', () => {
  it('allows a zero killer capacity but no negative one', () => {
    expect(parseKillerCapacity('0')).toBe(0);
    expect(() => parseKillerCapacity('-1')).toThrow('Killer capacity must be an integer >= 0, got "-1".');
  });

  it('requires at least one playout', () => {
    expect(parsePlayouts('250')).toBe(250);
    expect(() => parsePlayouts('0')).toThrow(InvalidArgumentError);
  });
});
