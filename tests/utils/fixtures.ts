/**
 * Test Fixtures and Utilities
 * Common boards, squares and move sources for engine tests
 */

import { Board } from '../../src/shared/engine/Board';
import { parseSquare, PLAYABLE_SQUARES, formatSquare } from '../../src/shared/engine/squares';
import type { MoveSource } from '../../src/server/game/ai/AIPlayer';
import type { Player, Square } from '../../src/shared/types/game';

/**
 * Square helper - "a1" to its index, failing the test on a bad name
 */
export function sq(name: string): Square {
  const square = parseSquare(name);
  if (square === null) {
    throw new Error(`Bad square name in test: ${name}`);
  }
  return square;
}

/**
 * Board reached by playing MOVES from the start position
 */
export function boardAfter(moves: string[]): Board {
  const board = new Board();
  for (const move of moves) {
    board.applyMove(move);
  }
  return board;
}

/**
 * Builds a board from rows 7..1, top first
 */
export function layout(rows: string[], sideToMove: Player = 'red'): Board {
  return Board.fromLayout(rows.join('\n'), sideToMove);
}

/**
 * RED on a1 with a single empty square (a2) beside it, BLUE walled in on g7.
 * RED's only legal move is a1-a2, which fills the board.
 */
export const SINGLE_MOVE_ROWS = [
  'XXXXXXb',
  'XXXXXXX',
  'XXXXXXX',
  'XXXXXXX',
  'XXXXXXX',
  '-XXXXXX',
  'rXXXXXX',
];

/**
 * RED walled in on a1, BLUE on g7 with g6 free: RED can only pass.
 */
export const RED_STUCK_ROWS = [
  'XXXXXXb',
  'XXXXXX-',
  'XXXXXXX',
  'XXXXXXX',
  'XXXXXXX',
  'XXXXXXX',
  'rXXXXXX',
];

/**
 * ROWS with the two colours exchanged
 */
export function swapColors(rows: string[]): string[] {
  return rows.map((row) => row.replace(/[rb]/g, (c) => (c === 'r' ? 'b' : 'r')));
}

/**
 * Playable squares whose contents differ between two boards, by name
 */
export function changedSquares(before: Board, after: Board): string[] {
  return PLAYABLE_SQUARES.filter((s) => before.get(s) !== after.get(s)).map(formatSquare);
}

/**
 * Move source that replays a fixed script of move strings
 */
export function scriptedSource(moves: string[]): MoveSource {
  let next = 0;
  return {
    selectMove: () => {
      if (next >= moves.length) {
        throw new Error('Scripted move source ran out of moves');
      }
      const move = moves[next];
      next += 1;
      return move;
    },
  };
}
