/**
 * Monte Carlo rollout evaluator.
 *
 * estimate(board, side) plays `playouts` uniformly random games from
 * `board`, `side` moving first, and returns the fraction that `side` won.
 * A playout ends as soon as a line is completed or the board fills.
 *
 * The estimate is statistical and never used for pruning. Move selection
 * with it picks the successor that minimizes the opponent's estimate.
 */
import { Board, Side, DEFAULT_PLAYOUTS } from '../core/types';
import { assertSide, isFull, legalMoves, opponent, placeMask, winner } from '../core/board';
import { SeededRandom } from '../utils/random';
import { createLogger } from '../utils/logger';

const logger = createLogger('rollout');

export interface RolloutConfig {
  playouts?: number;
  random: SeededRandom;
}

export interface RolloutStats {
  playouts: number;
}

export class RolloutEvaluator {
  readonly playouts: number;
  private rng: SeededRandom;
  private rolloutStats: RolloutStats = { playouts: 0 };

  constructor(config: RolloutConfig) {
    const playouts = config.playouts ?? DEFAULT_PLAYOUTS;
    if (!Number.isInteger(playouts) || playouts <= 0) {
      throw new RangeError(`Playout count must be a positive integer, got ${playouts}`);
    }
    this.playouts = playouts;
    this.rng = config.random;
  }

  get stats(): Readonly<RolloutStats> {
    return this.rolloutStats;
  }

  resetStats(): void {
    this.rolloutStats = { playouts: 0 };
  }

  /**
   * Estimated probability that `side` wins from `board`.
   * Finished games are answered exactly without sampling.
   */
  estimate(board: Board, side: Side): number {
    assertSide(side);

    const decided = winner(board);
    if (decided !== null) return decided === side ? 1 : 0;
    if (isFull(board)) return 0;

    let wins = 0;
    for (let i = 0; i < this.playouts; i++) {
      if (this.playout(board, side) === side) wins++;
    }
    this.rolloutStats.playouts += this.playouts;

    const estimate = wins / this.playouts;
    logger.trace({ board, side, wins, playouts: this.playouts }, 'rollout estimate');
    return estimate;
  }

  /**
   * One random game to completion. Returns the winner, or null on a draw.
   */
  private playout(start: Board, firstToMove: Side): Side | null {
    let board = start;
    let toMove = firstToMove;

    while (!isFull(board)) {
      const move = this.rng.choice([...legalMoves(board, toMove)]);
      board = placeMask(board, move.mask);
      const won = winner(board);
      if (won !== null) return won;
      toMove = opponent(toMove);
    }

    return null;
  }
}
