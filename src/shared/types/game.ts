/**
 * Core Ataxx domain types shared by the board state machine, the search
 * engine and the session driver.
 */

/** The two sides. RED always moves first. */
export type Player = 'red' | 'blue';

/**
 * Contents of a single cell of the backing grid.
 *
 * - 'empty'   – open, unoccupied square
 * - 'red' / 'blue' – occupied by a piece of that colour
 * - 'blocked' – permanently unusable for the current game (the two-cell
 *               border around the playable area and any placed blocks)
 */
export type PieceColor = Player | 'empty' | 'blocked';

/** Final result of a game. 'draw' is reported when piece counts are equal. */
export type GameOutcome = Player | 'draw';

/**
 * Linearized index of a square in the bordered backing grid
 * (row-major, {@link EXTENDED_SIDE} cells per row).
 */
export type Square = number;

/** Zero-based column/row pair over the playable 7×7 area (a1 = {0, 0}). */
export interface Position {
  col: number;
  row: number;
}

export type MoveType = 'pass' | 'extend' | 'jump';

export interface PassMove {
  type: 'pass';
}

/**
 * A piece move. Extends copy the source piece into an adjacent square;
 * jumps relocate it two squares away.
 */
export interface PieceMove {
  type: 'extend' | 'jump';
  from: Square;
  to: Square;
}

export type Move = PassMove | PieceMove;

/** Number of playable squares on a side. */
export const SIDE = 7;

/** Depth of the permanently blocked border around the playable area. */
export const BORDER = 2;

/** Side length of the backing grid, border included. */
export const EXTENDED_SIDE = SIDE + 2 * BORDER;

/** Number of cells in the backing grid. */
export const GRID_CELLS = EXTENDED_SIDE * EXTENDED_SIDE;

/** Number of playable squares. */
export const BOARD_AREA = SIDE * SIDE;

/** Consecutive jumps (without an intervening extend) that end the game. */
export const JUMP_LIMIT = 25;

export const COLUMN_LABELS = 'abcdefg';
export const ROW_LABELS = '1234567';

export function opponent(player: Player): Player {
  return player === 'red' ? 'blue' : 'red';
}

export function isPlayer(color: PieceColor): color is Player {
  return color === 'red' || color === 'blue';
}
