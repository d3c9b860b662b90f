/**
 * Unit tests for candidate selection and scorer construction.
 */
import { describe, it, expect } from 'vitest';
import { createScorer, selectCandidate } from '../../src/search/coordinator';
import { SeededRandom } from '../../src/utils/random';
import { newGame, parseBoard } from '../../src/core/board';

describe('selectCandidate', () => {
  const candidates = [
    { id: 'a', score: 1 },
    { id: 'b', score: 3 },
    { id: 'c', score: 3 },
    { id: 'd', score: 1 },
  ];

  it('takes the first highest when maximizing', () => {
    expect(selectCandidate(candidates, true).id).toBe('b');
  });

  it('takes the first lowest when minimizing', () => {
    expect(selectCandidate(candidates, false).id).toBe('a');
  });

  it('refuses an empty list', () => {
    expect(() => selectCandidate([], true)).toThrow('No candidates to select from');
  });
});

describe('createScorer', () => {
  it('builds exact scorers that count nodes', () => {
    for (const engine of ['alphabeta', 'minimax'] as const) {
      const scorer = createScorer(engine, { search: { enableCache: true } }, new SeededRandom(1));
      expect(scorer.alwaysMinimize).toBe(false);
      expect(scorer.score(newGame(), 'maximizer')).toBe(0);
      expect(scorer.work()).toBeGreaterThan(0);
    }
  });

  it('builds a rollout scorer that always minimizes', () => {
    const scorer = createScorer('rollout', { playouts: 20 }, new SeededRandom(1));
    expect(scorer.alwaysMinimize).toBe(true);
    expect(scorer.score(parseBoard('XXX/OO./...'), 'minimizer')).toBe(0);
    expect(scorer.score(parseBoard('XO./.../...'), 'maximizer')).toBeGreaterThanOrEqual(0);
    expect(scorer.work()).toBe(20);
  });
});
