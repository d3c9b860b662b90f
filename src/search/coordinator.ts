/**
 * Self-play coordinator.
 *
 * Drives one game to a terminal position. Each turn every legal successor
 * is scored from the opponent's point of view, the scored candidates are
 * shuffled with the game's seeded generator, and the first extremal one
 * is played:
 *   - exact engines: maximizer takes the highest minimax value, minimizer the lowest
 *   - rollout: the mover always takes the lowest opponent win estimate
 *
 * One engine (and so one cache and killer table) serves the whole game.
 */
import {
  Board,
  Side,
  Move,
  AlphaBetaConfig,
  EngineName,
  GameRecord,
  TurnRecord,
} from '../core/types';
import { assertSide, legalMoves, newGame, opponent, placeMask, winner } from '../core/board';
import { AlphaBetaEngine } from './alphabeta';
import { MinimaxEngine } from './minimax';
import { RolloutEvaluator } from './rollout';
import { SeededRandom } from '../utils/random';
import { createLogger } from '../utils/logger';

const logger = createLogger('coordinator');

export interface PlayOptions {
  seed: number;
  engine?: EngineName;
  firstSide?: Side;
  search?: Partial<AlphaBetaConfig>;
  playouts?: number;
  onTurn?: (turn: TurnRecord) => void;
}

interface Candidate {
  move: Move;
  board: Board;
  score: number;
}

/**
 * Scores a successor position for the side about to move in it.
 */
interface CandidateScorer {
  /** When set, the mover always minimizes regardless of side. */
  readonly alwaysMinimize: boolean;
  score(board: Board, sideToMove: Side): number;
  /** Cumulative search effort: nodes visited, or playouts. */
  work(): number;
}

export function createScorer(
  engine: EngineName,
  options: Pick<PlayOptions, 'search' | 'playouts'>,
  rng: SeededRandom
): CandidateScorer {
  switch (engine) {
    case 'alphabeta': {
      const alphabeta = new AlphaBetaEngine({ config: options.search });
      return {
        alwaysMinimize: false,
        score: (board, side) => alphabeta.bestScore(board, side),
        work: () => alphabeta.stats.nodes,
      };
    }
    case 'minimax': {
      const minimax = new MinimaxEngine({ enableCache: options.search?.enableCache ?? false });
      return {
        alwaysMinimize: false,
        score: (board, side) => minimax.bestScore(board, side),
        work: () => minimax.stats.nodes,
      };
    }
    case 'rollout': {
      const rollout = new RolloutEvaluator({ playouts: options.playouts, random: rng });
      return {
        alwaysMinimize: true,
        score: (board, side) => rollout.estimate(board, side),
        work: () => rollout.stats.playouts,
      };
    }
    default:
      throw new Error(`Unknown engine: ${String(engine)}`);
  }
}

/**
 * First candidate with the extremal score, in the given order.
 */
export function selectCandidate<T extends { score: number }>(
  candidates: readonly T[],
  maximize: boolean
): T {
  if (candidates.length === 0) {
    throw new Error('No candidates to select from');
  }
  let best = candidates[0];
  for (const candidate of candidates) {
    if (maximize ? candidate.score > best.score : candidate.score < best.score) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Play one automated game from the empty board.
 */
export function playGame(options: PlayOptions): GameRecord {
  const { seed, engine = 'alphabeta', firstSide = 'minimizer', onTurn } = options;
  assertSide(firstSide);

  const rng = new SeededRandom(seed);
  const scorer = createScorer(engine, options, rng);
  const turns: TurnRecord[] = [];

  let board = newGame();
  let side = firstSide;

  logger.debug({ seed, engine, firstSide }, 'starting game');

  while (winner(board) === null) {
    const moves = [...legalMoves(board, side)];
    if (moves.length === 0) break;

    const before = scorer.work();
    const next = opponent(side);
    const candidates: Candidate[] = moves.map(move => {
      const child = placeMask(board, move.mask);
      return { move, board: child, score: scorer.score(child, next) };
    });

    const maximize = !scorer.alwaysMinimize && side === 'maximizer';
    const chosen = selectCandidate(rng.shuffle(candidates), maximize);

    const turn: TurnRecord = {
      turn: turns.length + 1,
      side,
      board: chosen.board,
      move: chosen.move,
      score: chosen.score,
      nodes: scorer.work() - before,
    };
    turns.push(turn);
    logger.debug(
      { turn: turn.turn, side, row: chosen.move.row, col: chosen.move.col, score: chosen.score, nodes: turn.nodes },
      'move chosen'
    );
    onTurn?.(turn);

    board = chosen.board;
    side = next;
  }

  const result: GameRecord = {
    seed,
    engine,
    turns,
    finalBoard: board,
    winner: winner(board),
  };
  logger.debug({ winner: result.winner, turns: turns.length }, 'game finished');
  return result;
}
