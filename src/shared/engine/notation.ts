import type { Move } from '../types/game';
import { EngineErrorCode, IllegalMove } from './errors';
import { createMove, PASS } from './moves';
import { formatSquare, parseSquare } from './squares';

/**
 * Move text encoding.
 *
 * A pass is written "-"; any other move as "<col><row>-<col><row>", columns
 * a..g and rows 1..7, e.g. "a1-a2". This is the encoding accepted by
 * `Board.applyMove` and produced for move histories and logs.
 */

export const PASS_NOTATION = '-';

export function formatMove(move: Move): string {
  if (move.type === 'pass') {
    return PASS_NOTATION;
  }
  return `${formatSquare(move.from)}-${formatSquare(move.to)}`;
}

/**
 * Like {@link parseMove} but returns null instead of throwing.
 */
export function tryParseMove(text: string): Move | null {
  const trimmed = text.trim();
  if (trimmed === PASS_NOTATION) {
    return PASS;
  }
  if (trimmed.length !== 5 || trimmed.charAt(2) !== '-') {
    return null;
  }
  const from = parseSquare(trimmed.slice(0, 2));
  const to = parseSquare(trimmed.slice(3));
  if (from === null || to === null) {
    return null;
  }
  return createMove(from, to);
}

/**
 * Parse move text. Throws IllegalMove (MOVE_MALFORMED_NOTATION) when the
 * text names no square pair at distance 1 or 2 and is not a pass.
 */
export function parseMove(text: string): Move {
  const move = tryParseMove(text);
  if (!move) {
    throw new IllegalMove(
      EngineErrorCode.MOVE_MALFORMED_NOTATION,
      `Malformed move: "${text}"`,
      { text },
      'Notation'
    );
  }
  return move;
}

/**
 * Render a list of moves as numbered notation lines. Used by logs and tests.
 */
export function formatMoveList(moves: readonly Move[]): string[] {
  return moves.map((m, idx) => `${idx + 1}. ${formatMove(m)}`);
}
