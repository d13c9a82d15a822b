import type { GameOutcome, Move, PieceColor, Player, Square } from '../types/game';
import { EngineError, EngineErrorCode } from './errors';
import type { VictoryReason } from './victoryLogic';

/** One recorded cell write: the square and the colour it held before. */
export interface UndoEntry {
  square: Square;
  previous: PieceColor;
}

/**
 * Everything needed to take back one move (or pass): the board-level
 * scalars as they were before the move, and every cell write it made, in
 * write order.
 */
export interface UndoGroup {
  move: Move;
  sideToMove: Player;
  numJumps: number;
  winner: GameOutcome | null;
  reason: VictoryReason | null;
  entries: UndoEntry[];
}

export type UndoSnapshot = Omit<UndoGroup, 'entries'>;

/**
 * Stack of per-move undo groups. A group is opened before a move writes any
 * cell, receives each write through {@link record}, and is popped whole by
 * the Board's undo.
 */
export class UndoLog {
  private readonly groups: UndoGroup[] = [];

  get depth(): number {
    return this.groups.length;
  }

  begin(snapshot: UndoSnapshot): void {
    this.groups.push({ ...snapshot, entries: [] });
  }

  /** Record a write to SQUARE into the open group. */
  record(square: Square, previous: PieceColor): void {
    const current = this.groups[this.groups.length - 1];
    if (!current) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        'Undo entry recorded with no open group',
        { square },
        'UndoLog'
      );
    }
    current.entries.push({ square, previous });
  }

  pop(): UndoGroup | undefined {
    return this.groups.pop();
  }

  clear(): void {
    this.groups.length = 0;
  }
}
