/**
 * Plain-text transcript of a self-play game.
 *
 *   <blank>
 *   O move after 8232 search steps:      (exact engines)
 *   O move on score 0.214000:            (rollout)
 *    O |   |  
 *   ---+---+---
 *   ...
 *   <blank>
 *   Tied | X has won | O has won
 */
import { EngineName, GameRecord, Side, TurnRecord } from '../core/types';
import { renderBoard, symbol } from '../core/board';

export function formatTurn(turn: TurnRecord, engine: EngineName): string {
  const who = symbol(turn.side);
  const header = engine === 'rollout'
    ? `${who} move on score ${turn.score.toFixed(6)}:`
    : `${who} move after ${turn.nodes} search steps:`;
  return ['', header, renderBoard(turn.board)].join('\n');
}

export function formatResult(winner: Side | null): string {
  return ['', winner ? `${symbol(winner)} has won` : 'Tied'].join('\n');
}

export function formatGame(game: GameRecord): string {
  return [
    ...game.turns.map(turn => formatTurn(turn, game.engine)),
    formatResult(game.winner),
  ].join('\n');
}
