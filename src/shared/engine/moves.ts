import type { Move, PassMove, PieceMove, Square } from '../types/game';
import { isPlayableSquare, squareDistance } from './squares';

/** The single pass move. */
export const PASS: PassMove = Object.freeze({ type: 'pass' });

/**
 * Build the move FROM → TO, classified by distance. Returns null when either
 * square is off the playable board or the distance is not 1 or 2.
 */
export function createMove(from: Square, to: Square): PieceMove | null {
  if (!isPlayableSquare(from) || !isPlayableSquare(to)) {
    return null;
  }
  const distance = squareDistance(from, to);
  if (distance === 1) {
    return { type: 'extend', from, to };
  }
  if (distance === 2) {
    return { type: 'jump', from, to };
  }
  return null;
}

export function isPass(move: Move): move is PassMove {
  return move.type === 'pass';
}

export function isExtend(move: Move): move is PieceMove & { type: 'extend' } {
  return move.type === 'extend';
}

export function isJump(move: Move): move is PieceMove & { type: 'jump' } {
  return move.type === 'jump';
}

export function movesEqual(a: Move, b: Move): boolean {
  if (a.type === 'pass' || b.type === 'pass') {
    return a.type === b.type;
  }
  return a.from === b.from && a.to === b.to;
}
