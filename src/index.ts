/**
 * Public entry point: board operations, the search engines and self-play.
 */
import { Board, Side, ExactEngine } from './core/types';
import { AlphaBetaEngine } from './search/alphabeta';
import { RolloutEvaluator } from './search/rollout';

export * from './core/types';
export {
  newGame,
  place,
  placeMask,
  cellMask,
  cellAt,
  legalMoves,
  legalSuccessors,
  emptyCount,
  isFull,
  winner,
  opponent,
  symbol,
  assertSide,
  renderBoard,
  parseBoard,
} from './core/board';
export { terminalScore, heuristicScore } from './core/evaluator';
export * from './search';
export { SeededRandom } from './utils/random';

let defaultEngine: AlphaBetaEngine | undefined;

/**
 * Exact minimax value of `board` with `side` to move.
 * Without an engine, a shared default alpha-beta engine is used.
 */
export function bestScore(board: Board, side: Side, engine?: ExactEngine): number {
  if (engine) return engine.bestScore(board, side);
  defaultEngine ??= new AlphaBetaEngine();
  return defaultEngine.bestScore(board, side);
}

/**
 * Rollout estimate that `side` wins from `board`. A mover passes each
 * successor with its opponent as `side` and plays the lowest value.
 */
export function bestWinProbabilityComplement(
  board: Board,
  side: Side,
  evaluator: RolloutEvaluator
): number {
  return evaluator.estimate(board, side);
}
