/**
 * Core type definitions for the tic-tac-toe search engines.
 * Board state, sides, moves, scores and the records produced by self-play.
 */

// ─── Side (Player) ───────────────────────────────────────────────────
export type Side = 'maximizer' | 'minimizer';

export const ALL_SIDES: readonly Side[] = ['maximizer', 'minimizer'] as const;

/** Display symbol for each side. Rendering only. */
export const SIDE_SYMBOLS: Readonly<Record<Side, 'X' | 'O'>> = {
  maximizer: 'X',
  minimizer: 'O',
};

// ─── Board ───────────────────────────────────────────────────────────
/**
 * 18-bit packed board.
 *
 * Bits 9-17 hold the maximizer's cells, bits 0-8 the minimizer's.
 * Both halves are row-major with cell (0,0) at the most significant bit.
 */
export type Board = number;

export const BOARD_SIZE = 3;
export const CELL_COUNT = BOARD_SIZE * BOARD_SIZE;

/** Bit offset of the maximizer's half. */
export const MAXIMIZER_SHIFT = CELL_COUNT;

// ─── Moves ───────────────────────────────────────────────────────────
export interface Move {
  readonly row: number;
  readonly col: number;
  readonly mask: number; // side-specific single bit
}

// ─── Scores ──────────────────────────────────────────────────────────
/** Magnitude of a won game. Draws score 0. */
export const WIN_SCORE = 10;

// ─── Engine configuration ────────────────────────────────────────────
export interface AlphaBetaConfig {
  readonly enableCache: boolean;
  readonly enableKillers: boolean;
  readonly enableHeuristicOrdering: boolean;
  readonly killerCapacity: number;
}

/**
 * Cache off, killers on: the transposition cache skips whole subtrees,
 * so those nodes never feed the killer table.
 */
export const DEFAULT_ALPHABETA_CONFIG: AlphaBetaConfig = {
  enableCache: false,
  enableKillers: true,
  enableHeuristicOrdering: false,
  killerCapacity: 4,
};

export interface MinimaxConfig {
  readonly enableCache: boolean;
}

export const DEFAULT_PLAYOUTS = 500;

export interface SearchStats {
  nodes: number;
  cacheHits: number;
  cutoffs: number;
  killerCutoffs: number;
}

/** Anything that returns an exact minimax value for a (board, side) pair. */
export interface ExactEngine {
  bestScore(board: Board, side: Side): number;
  readonly stats: Readonly<SearchStats>;
}

// ─── Self-play records ───────────────────────────────────────────────
export type EngineName = 'alphabeta' | 'minimax' | 'rollout';

export const ENGINE_NAMES: readonly EngineName[] = ['alphabeta', 'minimax', 'rollout'] as const;

export interface TurnRecord {
  readonly turn: number;
  readonly side: Side;
  readonly board: Board;
  readonly move: Move;
  readonly score: number;
  readonly nodes: number; // visited nodes, or playouts for rollout
}

export interface GameRecord {
  readonly seed: number;
  readonly engine: EngineName;
  readonly turns: readonly TurnRecord[];
  readonly finalBoard: Board;
  readonly winner: Side | null;
}
