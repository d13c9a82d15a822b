import { SIDE, type PieceMove } from '../types/game';
import type { Board } from './Board';
import { createMove } from './moves';
import { neighbor, squareIndex } from './squares';

/**
 * Every legal non-pass move for the side to move on BOARD.
 *
 * Sources are visited column by column (a..g), rows 1..7 within a column;
 * destinations by column offset then row offset, −2..2 each. The order is
 * fixed so searches over the list are reproducible.
 */
export function enumerateLegalMoves(board: Board): PieceMove[] {
  const mover = board.whoseMove();
  const moves: PieceMove[] = [];

  for (let col = 0; col < SIDE; col++) {
    for (let row = 0; row < SIDE; row++) {
      const from = squareIndex(col, row);
      if (board.get(from) !== mover) {
        continue;
      }
      for (let dc = -2; dc <= 2; dc++) {
        for (let dr = -2; dr <= 2; dr++) {
          const to = neighbor(from, dc, dr);
          if (board.get(to) !== 'empty') {
            continue;
          }
          const move = createMove(from, to);
          if (move && board.legal(move)) {
            moves.push(move);
          }
        }
      }
    }
  }

  return moves;
}

export function hasLegalMove(board: Board): boolean {
  return board.canMove(board.whoseMove());
}
