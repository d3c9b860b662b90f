/**
 * Exhaustive minimax with alpha-beta pruning.
 *
 * Move ordering, applied in two layers over the row-major move list:
 *   1. optional full sort by heuristicScore of the child, highest first
 *   2. stable partition putting killer moves in front
 * Ordering only changes how many nodes are visited, never the value.
 *
 * The transposition cache, when enabled, is consulted before anything
 * else at a node. A hit skips the subtree entirely, so it also skips the
 * killer bookkeeping that subtree would have done. Only values strictly
 * inside the (alpha, beta) window are stored: anything on or outside the
 * window is a bound, not the minimax value.
 */
import {
  Board,
  Side,
  AlphaBetaConfig,
  DEFAULT_ALPHABETA_CONFIG,
  ExactEngine,
  SearchStats,
} from '../core/types';
import { assertSide, legalMoves, opponent, placeMask } from '../core/board';
import { heuristicScore, terminalScore } from '../core/evaluator';
import { TranspositionTable } from './transposition';
import { KillerTable } from './killers';
import { createLogger } from '../utils/logger';

const logger = createLogger('alphabeta');

interface Child {
  mask: number;
  board: Board;
}

export interface AlphaBetaOptions {
  config?: Partial<AlphaBetaConfig>;
  transpositionTable?: TranspositionTable;
  killers?: KillerTable;
}

export function emptyStats(): SearchStats {
  return { nodes: 0, cacheHits: 0, cutoffs: 0, killerCutoffs: 0 };
}

export class AlphaBetaEngine implements ExactEngine {
  readonly config: AlphaBetaConfig;
  readonly transpositionTable: TranspositionTable;
  readonly killers: KillerTable;
  private searchStats: SearchStats = emptyStats();

  constructor(options: AlphaBetaOptions = {}) {
    this.config = { ...DEFAULT_ALPHABETA_CONFIG, ...options.config };
    this.transpositionTable = options.transpositionTable ?? new TranspositionTable();
    this.killers = options.killers ?? new KillerTable(this.config.killerCapacity);
  }

  get stats(): Readonly<SearchStats> {
    return this.searchStats;
  }

  resetStats(): void {
    this.searchStats = emptyStats();
  }

  /**
   * Minimax value of `board` with `side` to move, under a full window.
   */
  bestScore(board: Board, side: Side): number {
    const before = this.searchStats.nodes;
    const value = this.search(board, side, -Infinity, Infinity);
    logger.trace(
      { board, side, value, nodes: this.searchStats.nodes - before },
      'alpha-beta search complete'
    );
    return value;
  }

  /**
   * Alpha-beta search. `alpha` is the value the maximizer can already
   * guarantee elsewhere, `beta` the value the minimizer can.
   */
  search(board: Board, side: Side, alpha: number = -Infinity, beta: number = Infinity): number {
    assertSide(side);

    if (this.config.enableCache) {
      const cached = this.transpositionTable.get(board, side);
      if (cached !== undefined) {
        this.searchStats.cacheHits++;
        return cached;
      }
    }

    this.searchStats.nodes++;

    const terminal = terminalScore(board);
    if (terminal !== null) return terminal;

    const children = this.orderedChildren(board, side);
    if (children.length === 0) {
      throw new Error(`Non-terminal board ${board} has no legal moves`);
    }

    const windowLow = alpha;
    const windowHigh = beta;
    const next = opponent(side);
    let value: number;

    if (side === 'maximizer') {
      value = -Infinity;
      for (const child of children) {
        value = Math.max(value, this.search(child.board, next, alpha, beta));
        alpha = Math.max(alpha, value);
        if (alpha >= beta) {
          this.recordCutoff(child.mask, true);
          break;
        }
      }
    } else {
      value = Infinity;
      for (const child of children) {
        value = Math.min(value, this.search(child.board, next, alpha, beta));
        beta = Math.min(beta, value);
        if (alpha >= beta) {
          this.recordCutoff(child.mask, false);
          break;
        }
      }
    }

    if (this.config.enableCache && value > windowLow && value < windowHigh) {
      this.transpositionTable.put(board, side, value);
    }

    return value;
  }

  private orderedChildren(board: Board, side: Side): Child[] {
    let children: Child[] = [];
    for (const move of legalMoves(board, side)) {
      children.push({ mask: move.mask, board: placeMask(board, move.mask) });
    }

    if (this.config.enableHeuristicOrdering) {
      const scored = children.map(child => ({ child, score: heuristicScore(child.board) }));
      scored.sort((a, b) => b.score - a.score);
      children = scored.map(s => s.child);
    }

    if (this.config.enableKillers) {
      children = this.killers.reorder(children, child => child.mask);
    }

    return children;
  }

  /**
   * Only maximizer cut-offs feed the killer table.
   */
  private recordCutoff(mask: number, byMaximizer: boolean): void {
    this.searchStats.cutoffs++;
    if (!this.config.enableKillers) return;
    if (this.killers.has(mask)) this.searchStats.killerCutoffs++;
    if (byMaximizer) this.killers.push(mask);
  }
}
