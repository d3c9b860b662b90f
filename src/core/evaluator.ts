/**
 * Board evaluation.
 *
 * terminalScore is exact and only defined on finished games:
 *   +WIN_SCORE maximizer won, -WIN_SCORE minimizer won, 0 draw.
 *
 * heuristicScore orders sibling moves and is never a search result:
 *   per line held by one side only, 1 / 10 / 100 for 1 / 2 / 3 marks,
 *   positive for the maximizer, negative for the minimizer.
 */
import { Board, WIN_SCORE } from './types';
import { LINE_MASKS, isFull, sideBits, winner } from './board';

export function terminalScore(board: Board): number | null {
  const won = winner(board);
  if (won === 'maximizer') return WIN_SCORE;
  if (won === 'minimizer') return -WIN_SCORE;
  if (isFull(board)) return 0;
  return null;
}

function countBits(bits: number): number {
  let count = 0;
  for (let n = bits; n; n &= n - 1) count++;
  return count;
}

export function heuristicScore(board: Board): number {
  const x = sideBits(board, 'maximizer');
  const o = sideBits(board, 'minimizer');
  let score = 0;

  for (const line of LINE_MASKS) {
    const countX = countBits(x & line);
    const countO = countBits(o & line);
    if (countX > 0 && countO === 0) {
      score += 10 ** (countX - 1);
    } else if (countO > 0 && countX === 0) {
      score -= 10 ** (countO - 1);
    }
  }

  return score;
}
