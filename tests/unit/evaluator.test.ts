/**
 * Unit tests for terminal and heuristic evaluation.
 */
import { describe, it, expect } from 'vitest';
import { heuristicScore, terminalScore } from '../../src/core/evaluator';
import { newGame, parseBoard } from '../../src/core/board';
import { WIN_SCORE } from '../../src/core/types';

describe('terminalScore', () => {
  it('scores wins and draws exactly', () => {
    expect(terminalScore(parseBoard('XXX/OO./...'))).toBe(WIN_SCORE);
    expect(terminalScore(parseBoard('XX./OOO/X..'))).toBe(-WIN_SCORE);
    expect(terminalScore(parseBoard('XOX/XOO/OXX'))).toBe(0);
  });

  it('has no value for an unfinished game', () => {
    expect(terminalScore(newGame())).toBeNull();
    expect(terminalScore(parseBoard('XO./.X./..O'))).toBeNull();
  });
});

describe('heuristicScore', () => {
  it('is zero on the empty board', () => {
    expect(heuristicScore(newGame())).toBe(0);
  });

  it('counts one point per open line through a lone mark', () => {
    expect(heuristicScore(parseBoard('.../.X./...'))).toBe(4);
    expect(heuristicScore(parseBoard('X../.../...'))).toBe(3);
    expect(heuristicScore(parseBoard('.../.O./...'))).toBe(-4);
  });

  it('ignores mixed lines', () => {
    // X: top row, left column. O: middle row, middle column, anti-diagonal.
    expect(heuristicScore(parseBoard('X../.O./...'))).toBe(-1);
  });

  it('weights two and three in a line by powers of ten', () => {
    expect(heuristicScore(parseBoard('XX./.O./...'))).toBe(9);
    expect(heuristicScore(parseBoard('XXX/OO./...'))).toBe(91);
  });
});
