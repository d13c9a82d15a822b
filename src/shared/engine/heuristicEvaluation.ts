import type { Board } from './Board';

/**
 * Magnitude of a decided game. Any material difference is far below it, so
 * a won line always outranks a merely favourable one.
 */
export const WINNING_VALUE = 1_000_000;

/** Larger than any score the evaluator can return. */
export const INFINITY_SCORE = Number.MAX_SAFE_INTEGER;

/**
 * Static score of BOARD from RED's point of view.
 *
 * Decided games score ±(WINNING_VALUE + remainingDepth), so a win found
 * closer to the root outranks a later one and a loss is postponed as long
 * as possible; draws score 0. Undecided positions score the material
 * difference, red − blue.
 */
export function staticScore(board: Board, remainingDepth: number): number {
  const winner = board.getWinner();
  switch (winner) {
    case 'red':
      return WINNING_VALUE + remainingDepth;
    case 'blue':
      return -(WINNING_VALUE + remainingDepth);
    case 'draw':
      return 0;
    default:
      return board.redPieces() - board.bluePieces();
  }
}
