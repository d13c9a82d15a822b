import {
  BORDER,
  COLUMN_LABELS,
  EXTENDED_SIDE,
  GRID_CELLS,
  ROW_LABELS,
  SIDE,
  type Position,
  type Square,
} from '../types/game';

/**
 * Bordered-grid addressing.
 *
 * The 7×7 playable area sits inside an 11×11 backing array whose outer two
 * rings are permanently blocked. Any offset within two columns/rows of a
 * playable square therefore lands on a real cell, and neighbour scans never
 * need bounds checks.
 */

/** Linearized index of the square at zero-based (col, row). */
export function squareIndex(col: number, row: number): Square {
  return (row + BORDER) * EXTENDED_SIDE + (col + BORDER);
}

/** Index of the square DC columns and DR rows away from SQ. */
export function neighbor(sq: Square, dc: number, dr: number): Square {
  return sq + dc + dr * EXTENDED_SIDE;
}

/** Zero-based playable column of SQ (negative or ≥ 7 inside the border). */
export function squareCol(sq: Square): number {
  return (sq % EXTENDED_SIDE) - BORDER;
}

/** Zero-based playable row of SQ (negative or ≥ 7 inside the border). */
export function squareRow(sq: Square): number {
  return Math.floor(sq / EXTENDED_SIDE) - BORDER;
}

export function squarePosition(sq: Square): Position {
  return { col: squareCol(sq), row: squareRow(sq) };
}

export function isPlayableSquare(sq: Square): boolean {
  if (!Number.isInteger(sq) || sq < 0 || sq >= GRID_CELLS) {
    return false;
  }
  const { col, row } = squarePosition(sq);
  return col >= 0 && col < SIDE && row >= 0 && row < SIDE;
}

/** Chebyshev (king-move) distance between two squares. */
export function squareDistance(a: Square, b: Square): number {
  return Math.max(
    Math.abs(squareCol(a) - squareCol(b)),
    Math.abs(squareRow(a) - squareRow(b))
  );
}

/** The centre square, d4. */
export const CENTER_SQUARE: Square = squareIndex(3, 3);

/** Every playable square, a1..g1, a2..g2, …, a7..g7. */
export const PLAYABLE_SQUARES: readonly Square[] = Array.from({ length: SIDE * SIDE }, (_, i) =>
  squareIndex(i % SIDE, Math.floor(i / SIDE))
);

/**
 * Format a playable square as "a1".."g7". Border squares have no name and
 * format as "??".
 */
export function formatSquare(sq: Square): string {
  if (!isPlayableSquare(sq)) {
    return '??';
  }
  return `${COLUMN_LABELS[squareCol(sq)]}${ROW_LABELS[squareRow(sq)]}`;
}

/** Parse "a1".."g7". Returns null for anything else. */
export function parseSquare(text: string): Square | null {
  if (text.length !== 2) {
    return null;
  }
  const col = COLUMN_LABELS.indexOf(text.charAt(0));
  const row = ROW_LABELS.indexOf(text.charAt(1));
  if (col < 0 || row < 0) {
    return null;
  }
  return squareIndex(col, row);
}

/**
 * Reflections of SQ used for symmetric block placement: across the middle
 * row, across the middle column, and through the centre point. Duplicates
 * (for squares on an axis) and SQ itself are removed.
 */
export function reflectionsOf(sq: Square): Square[] {
  const { col, row } = squarePosition(sq);
  const last = SIDE - 1;
  const candidates = [
    squareIndex(col, last - row),
    squareIndex(last - col, row),
    squareIndex(last - col, last - row),
  ];
  const out: Square[] = [];
  for (const candidate of candidates) {
    if (candidate !== sq && !out.includes(candidate)) {
      out.push(candidate);
    }
  }
  return out;
}
