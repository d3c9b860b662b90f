/**
 * Command-line value parsers.
 * Each throws commander's InvalidArgumentError so the CLI reports a
 * usage error and exits non-zero.
 */
import { InvalidArgumentError } from 'commander';
import { Side, EngineName, ENGINE_NAMES } from '../core/types';

/**
 * Parse the random seed. Must be an integer (sign allowed).
 */
export function parseSeed(value: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`Seed must be an integer, got "${value}".`);
  }
  const seed = Number(trimmed);
  if (!Number.isSafeInteger(seed)) {
    throw new InvalidArgumentError(`Seed is out of range: "${value}".`);
  }
  return seed;
}

/**
 * Normalize a side name: x / maximizer, o / minimizer (any case).
 */
export function parseSide(value: string): Side {
  const mapping: Record<string, Side> = {
    x: 'maximizer',
    max: 'maximizer',
    maximizer: 'maximizer',
    o: 'minimizer',
    min: 'minimizer',
    minimizer: 'minimizer',
  };
  const side = mapping[value.toLowerCase().trim()];
  if (!side) {
    throw new InvalidArgumentError(`Unknown side: "${value}". Use x or o.`);
  }
  return side;
}

export function parseEngine(value: string): EngineName {
  const engine = ENGINE_NAMES.find(name => name === value.toLowerCase().trim());
  if (!engine) {
    throw new InvalidArgumentError(`Unknown engine: "${value}". Valid engines: ${ENGINE_NAMES.join(', ')}`);
  }
  return engine;
}

function parseInteger(value: string, min: number, what: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < min) {
    throw new InvalidArgumentError(`${what} must be an integer >= ${min}, got "${value}".`);
  }
  return n;
}

export function parseKillerCapacity(value: string): number {
  return parseInteger(value, 0, 'Killer capacity');
}

export function parsePlayouts(value: string): number {
  return parseInteger(value, 1, 'Playout count');
}
