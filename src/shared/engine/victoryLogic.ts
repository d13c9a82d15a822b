import type { GameOutcome, Player } from '../types/game';
import { JUMP_LIMIT } from '../types/game';

export type VictoryReason = 'board_filled' | 'elimination' | 'jump_limit' | 'no_moves';

export interface VictoryResult {
  isGameOver: boolean;
  winner?: GameOutcome;
  reason?: VictoryReason;
}

/**
 * The slice of board state the victory rules read.
 */
export interface VictoryView {
  redPieces: number;
  bluePieces: number;
  /** Number of unblocked playable squares. */
  totalOpen: number;
  /** Consecutive jumps since the last extend. */
  numJumps: number;
  canMove(player: Player): boolean;
}

function byPieceCount(view: VictoryView): GameOutcome {
  if (view.redPieces > view.bluePieces) {
    return 'red';
  }
  if (view.bluePieces > view.redPieces) {
    return 'blue';
  }
  return 'draw';
}

/**
 * Side-effect-free terminal check, applied in priority order:
 *
 * 1. Board full: more pieces wins, equal counts draw.
 * 2. One side has no pieces: the other side wins.
 * 3. {@link JUMP_LIMIT} consecutive jumps: decided by piece count.
 * 4. Neither side can move: decided by piece count.
 *
 * Rule 1 precedes rule 4 so a full board (where nobody can move either)
 * always resolves as a fill.
 */
export function evaluateVictory(view: VictoryView): VictoryResult {
  if (view.redPieces + view.bluePieces === view.totalOpen) {
    return { isGameOver: true, winner: byPieceCount(view), reason: 'board_filled' };
  }

  if (view.redPieces === 0) {
    return { isGameOver: true, winner: 'blue', reason: 'elimination' };
  }
  if (view.bluePieces === 0) {
    return { isGameOver: true, winner: 'red', reason: 'elimination' };
  }

  if (view.numJumps >= JUMP_LIMIT) {
    return { isGameOver: true, winner: byPieceCount(view), reason: 'jump_limit' };
  }

  if (!view.canMove('red') && !view.canMove('blue')) {
    return { isGameOver: true, winner: byPieceCount(view), reason: 'no_moves' };
  }

  return { isGameOver: false };
}
