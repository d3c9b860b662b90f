/**
 * Transposition table for exhaustive search.
 *
 * Keys pack the board and the side to move into one number:
 * bits 0-17 the board, bit 18 set when the maximizer is to move.
 * Values are exact minimax scores, so the first stored value for a key
 * is final and later puts are ignored.
 *
 * One table per engine instance; nothing is shared between engines.
 */
import { Board, Side } from '../core/types';

const SIDE_BIT = 1 << 18;

export function transpositionKey(board: Board, side: Side): number {
  return side === 'maximizer' ? board | SIDE_BIT : board;
}

export class TranspositionTable {
  private table: Map<number, number>;
  private hitCount = 0;

  constructor() {
    this.table = new Map();
  }

  /**
   * Look up the value for a position, counting hits.
   */
  get(board: Board, side: Side): number | undefined {
    const value = this.table.get(transpositionKey(board, side));
    if (value !== undefined) this.hitCount++;
    return value;
  }

  has(board: Board, side: Side): boolean {
    return this.table.has(transpositionKey(board, side));
  }

  /**
   * Store a value. Returns false when the key already had one.
   */
  put(board: Board, side: Side, value: number): boolean {
    const key = transpositionKey(board, side);
    if (this.table.has(key)) return false;
    this.table.set(key, value);
    return true;
  }

  get size(): number {
    return this.table.size;
  }

  get hits(): number {
    return this.hitCount;
  }

  clear(): void {
    this.table.clear();
    this.hitCount = 0;
  }
}
