/**
 * Plain exhaustive minimax, no pruning.
 * Optionally memoized per (board, side); every non-terminal value it
 * computes is exact, so all of them can be cached.
 */
import { Board, Side, ExactEngine, MinimaxConfig, SearchStats } from '../core/types';
import { assertSide, legalSuccessors, opponent } from '../core/board';
import { terminalScore } from '../core/evaluator';
import { TranspositionTable } from './transposition';
import { emptyStats } from './alphabeta';

export class MinimaxEngine implements ExactEngine {
  readonly config: MinimaxConfig;
  readonly transpositionTable: TranspositionTable;
  private searchStats: SearchStats = emptyStats();

  constructor(config: Partial<MinimaxConfig> = {}, transpositionTable?: TranspositionTable) {
    this.config = { enableCache: true, ...config };
    this.transpositionTable = transpositionTable ?? new TranspositionTable();
  }

  get stats(): Readonly<SearchStats> {
    return this.searchStats;
  }

  resetStats(): void {
    this.searchStats = emptyStats();
  }

  bestScore(board: Board, side: Side): number {
    return this.search(board, side);
  }

  search(board: Board, side: Side): number {
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

    const next = opponent(side);
    const scores = legalSuccessors(board, side).map(child => this.search(child, next));
    if (scores.length === 0) {
      throw new Error(`Non-terminal board ${board} has no legal moves`);
    }

    const value = side === 'maximizer' ? Math.max(...scores) : Math.min(...scores);

    if (this.config.enableCache) {
      this.transpositionTable.put(board, side, value);
    }
    return value;
  }
}
