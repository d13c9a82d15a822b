import {
  BOARD_AREA,
  GRID_CELLS,
  ROW_LABELS,
  SIDE,
  opponent,
  type GameOutcome,
  type Move,
  type PieceColor,
  type Player,
  type Square,
} from '../types/game';
import { EngineError, EngineErrorCode, IllegalBlock, IllegalMove, InvalidState } from './errors';
import { PASS, isExtend, isJump, isPass } from './moves';
import { formatMove, parseMove, tryParseMove } from './notation';
import {
  PLAYABLE_SQUARES,
  formatSquare,
  isPlayableSquare,
  neighbor,
  parseSquare,
  reflectionsOf,
  squareDistance,
  squareIndex,
} from './squares';
import { UndoLog } from './undoLog';
import { evaluateVictory, type VictoryReason } from './victoryLogic';

/**
 * Observer invoked with the board after every successful state change.
 * Observers must not mutate the board they are handed.
 */
export type BoardNotifier = (board: Board) => void;

export interface BoardOptions {
  /**
   * Fork the position of another board: grid, counts, side to move, jump
   * counter and result are copied; move history and undo log start empty.
   */
  copyFrom?: Board;
  notifier?: BoardNotifier;
}

const NOOP_NOTIFIER: BoardNotifier = () => {};

const CELL_CHARS: Record<PieceColor, string> = {
  red: 'r',
  blue: 'b',
  blocked: 'X',
  empty: '-',
};

const LAYOUT_CHARS: Partial<Record<string, PieceColor>> = {
  r: 'red',
  b: 'blue',
  X: 'blocked',
  '-': 'empty',
};

const COLUMN_LEGEND = '   a b c d e f g';

/** Starting layout: each colour holds two diagonally opposite corners. */
const INITIAL_PIECES: ReadonlyArray<[Square, Player]> = [
  [squareIndex(0, 0), 'red'],
  [squareIndex(SIDE - 1, SIDE - 1), 'red'],
  [squareIndex(0, SIDE - 1), 'blue'],
  [squareIndex(SIDE - 1, 0), 'blue'],
];

function emptyCounts(): Record<PieceColor, number> {
  return { red: 0, blue: 0, empty: 0, blocked: 0 };
}

/**
 * An Ataxx board.
 *
 * Squares are stored in an 11×11 array: the 7×7 playable area surrounded by
 * two permanently blocked rings, so every lookup within two columns/rows of
 * a playable square is in range and looks blocked off the edge.
 *
 * All mutation goes through {@link applyMove}, {@link pass}, {@link undo},
 * {@link placeBlock} and {@link clear}. Each applied move opens one undo
 * group that records every cell it writes, so apply/undo pairs restore the
 * exact prior position.
 */
export class Board {
  private readonly cells: PieceColor[] = new Array<PieceColor>(GRID_CELLS).fill('blocked');

  /** Per-state counts over the playable area; always sum to BOARD_AREA. */
  private counts: Record<PieceColor, number> = emptyCounts();

  private sideToMove: Player = 'red';

  /** Consecutive jumps since the last extend (or the start of the game). */
  private jumps = 0;

  private winner: GameOutcome | null = null;
  private victoryReason: VictoryReason | null = null;

  private history: Move[] = [];
  private readonly undoLog = new UndoLog();

  /** True for a board forked from a game already under way. */
  private forkedMidGame = false;

  private notifier: BoardNotifier;

  constructor(options: BoardOptions = {}) {
    this.notifier = options.notifier ?? NOOP_NOTIFIER;
    if (options.copyFrom) {
      this.copyPosition(options.copyFrom);
      this.announce();
    } else {
      this.clear();
    }
  }

  /**
   * Board whose grid is read from LAYOUT, in the form {@link toString}
   * prints without a legend: seven rows from 7 down to 1, one of `r b X -`
   * per cell, whitespace ignored. The result is evaluated for a winner and
   * has an empty history, so blocks may still be placed on it.
   *
   * @throws EngineError (BOARD_MALFORMED_LAYOUT) for anything else.
   */
  static fromLayout(layout: string, sideToMove: Player = 'red'): Board {
    const chars = layout.replace(/\s+/g, '');
    if (chars.length !== BOARD_AREA) {
      throw new EngineError(
        EngineErrorCode.BOARD_MALFORMED_LAYOUT,
        `Board layout must have ${BOARD_AREA} cells, got ${chars.length}`,
        { cells: chars.length },
        'Board'
      );
    }

    const board = new Board();
    board.counts = emptyCounts();
    for (let i = 0; i < BOARD_AREA; i++) {
      const color = LAYOUT_CHARS[chars.charAt(i)];
      if (color === undefined) {
        throw new EngineError(
          EngineErrorCode.BOARD_MALFORMED_LAYOUT,
          `Unknown cell character "${chars.charAt(i)}"`,
          { index: i },
          'Board'
        );
      }
      const sq = squareIndex(i % SIDE, SIDE - 1 - Math.floor(i / SIDE));
      board.cells[sq] = color;
      board.counts[color] += 1;
    }
    board.sideToMove = sideToMove;
    board.updateWinner();
    return board;
  }

  /** A forked copy of this board with a no-op notifier. */
  copy(): Board {
    return new Board({ copyFrom: this });
  }

  private copyPosition(source: Board): void {
    for (let sq = 0; sq < GRID_CELLS; sq++) {
      this.cells[sq] = source.cells[sq];
    }
    this.counts = { ...source.counts };
    this.sideToMove = source.sideToMove;
    this.jumps = source.jumps;
    this.winner = source.winner;
    this.victoryReason = source.victoryReason;
    this.forkedMidGame = source.gameStarted();
  }

  /** Reset to the starting layout with no blocks, RED to move. */
  clear(): void {
    this.cells.fill('blocked');
    for (const sq of PLAYABLE_SQUARES) {
      this.cells[sq] = 'empty';
    }
    this.counts = emptyCounts();
    this.counts.empty = BOARD_AREA;
    for (const [sq, color] of INITIAL_PIECES) {
      this.cells[sq] = color;
      this.counts.empty -= 1;
      this.counts[color] += 1;
    }

    this.sideToMove = 'red';
    this.jumps = 0;
    this.winner = null;
    this.victoryReason = null;
    this.history = [];
    this.undoLog.clear();
    this.forkedMidGame = false;

    this.announce();
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /** Contents of SQ. Indices outside the backing grid read as blocked. */
  get(sq: Square): PieceColor {
    if (!Number.isInteger(sq) || sq < 0 || sq >= GRID_CELLS) {
      return 'blocked';
    }
    return this.cells[sq];
  }

  /** Contents of the square named like "d4". Unknown names read as blocked. */
  colorAt(square: string): PieceColor {
    const sq = parseSquare(square);
    return sq === null ? 'blocked' : this.get(sq);
  }

  whoseMove(): Player {
    return this.sideToMove;
  }

  numPieces(color: PieceColor): number {
    return this.counts[color];
  }

  redPieces(): number {
    return this.counts.red;
  }

  bluePieces(): number {
    return this.counts.blue;
  }

  /** Number of unblocked playable squares. */
  totalOpen(): number {
    return BOARD_AREA - this.counts.blocked;
  }

  /** Moves and passes made since the last clear (or since this fork). */
  numMoves(): number {
    return this.history.length;
  }

  /** Consecutive jumps since the last extend. */
  numJumps(): number {
    return this.jumps;
  }

  /** The result once the game is over, otherwise null. */
  getWinner(): GameOutcome | null {
    return this.winner;
  }

  getVictoryReason(): VictoryReason | null {
    return this.victoryReason;
  }

  allMoves(): Move[] {
    return [...this.history];
  }

  /** True once a move or pass has been made in this game. Blocks are then locked. */
  gameStarted(): boolean {
    return this.forkedMidGame || this.history.length > 0;
  }

  // ---------------------------------------------------------------------------
  // Legality
  // ---------------------------------------------------------------------------

  /**
   * True iff MOVE may be applied now. A pass is legal only when the side to
   * move has no other move; any other move needs a source of the mover's
   * colour, an empty destination, and a distance matching its type.
   */
  legal(move: Move | string | null | undefined): boolean {
    if (move === null || move === undefined) {
      return false;
    }
    const resolved = typeof move === 'string' ? tryParseMove(move) : move;
    if (!resolved) {
      return false;
    }
    if (isPass(resolved)) {
      return !this.canMove(this.sideToMove);
    }

    const { from, to } = resolved;
    if (!isPlayableSquare(from) || !isPlayableSquare(to)) {
      return false;
    }
    if (this.cells[from] !== this.sideToMove || this.cells[to] !== 'empty') {
      return false;
    }
    const distance = squareDistance(from, to);
    return isExtend(resolved) ? distance === 1 : distance === 2;
  }

  /**
   * True iff PLAYER has a piece with an empty square within two columns
   * and rows, regardless of whose turn it is.
   */
  canMove(player: Player): boolean {
    for (const sq of PLAYABLE_SQUARES) {
      if (this.cells[sq] !== player) {
        continue;
      }
      for (let dr = -2; dr <= 2; dr++) {
        for (let dc = -2; dc <= 2; dc++) {
          if (this.cells[neighbor(sq, dc, dr)] === 'empty') {
            return true;
          }
        }
      }
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Apply MOVE (a Move or its text form) for the side to move.
   *
   * @throws IllegalMove when the move is not legal; the board is unchanged.
   */
  applyMove(move: Move | string): void {
    const resolved = typeof move === 'string' ? parseMove(move) : move;
    if (!this.legal(resolved)) {
      throw new IllegalMove(
        EngineErrorCode.RULES_ILLEGAL_MOVE,
        `Illegal move: ${formatMove(resolved)}`,
        { move: formatMove(resolved), sideToMove: this.sideToMove }
      );
    }

    this.undoLog.begin({
      move: resolved,
      sideToMove: this.sideToMove,
      numJumps: this.jumps,
      winner: this.winner,
      reason: this.victoryReason,
    });
    this.history.push(resolved);

    if (isPass(resolved)) {
      this.sideToMove = opponent(this.sideToMove);
      this.announce();
      return;
    }

    const mover = this.sideToMove;
    const other = opponent(mover);

    if (isJump(resolved)) {
      this.set(resolved.from, 'empty');
      this.jumps += 1;
    } else {
      this.jumps = 0;
    }
    this.set(resolved.to, mover);

    for (let dr = -1; dr <= 1; dr++) {
      for (let dc = -1; dc <= 1; dc++) {
        const sq = neighbor(resolved.to, dc, dr);
        if (this.cells[sq] === other) {
          this.set(sq, mover);
        }
      }
    }

    this.sideToMove = other;
    this.updateWinner();
    this.announce();
  }

  /**
   * Pass the turn.
   *
   * @throws IllegalMove when the side to move still has a move.
   */
  pass(): void {
    this.applyMove(PASS);
  }

  /**
   * Take back the most recent move or pass, restoring every cell it wrote,
   * the piece counts, the side to move, the jump counter and the result.
   *
   * @throws InvalidState when there is nothing to undo.
   */
  undo(): void {
    const group = this.undoLog.pop();
    if (!group) {
      throw new InvalidState(EngineErrorCode.STATE_NOTHING_TO_UNDO, 'No move to undo', {}, 'Board');
    }

    for (let i = group.entries.length - 1; i >= 0; i--) {
      const { square, previous } = group.entries[i];
      this.counts[this.cells[square]] -= 1;
      this.counts[previous] += 1;
      this.cells[square] = previous;
    }

    this.sideToMove = group.sideToMove;
    this.jumps = group.numJumps;
    this.winner = group.winner;
    this.victoryReason = group.reason;
    this.history.pop();

    this.announce();
  }

  /** Undoable write of COLOR to SQ. */
  private set(sq: Square, color: PieceColor): void {
    const previous = this.cells[sq];
    this.undoLog.record(sq, previous);
    this.counts[previous] -= 1;
    this.counts[color] += 1;
    this.cells[sq] = color;
  }

  private updateWinner(): void {
    const result = evaluateVictory({
      redPieces: this.counts.red,
      bluePieces: this.counts.blue,
      totalOpen: this.totalOpen(),
      numJumps: this.jumps,
      canMove: (player) => this.canMove(player),
    });
    this.winner = result.winner ?? null;
    this.victoryReason = result.reason ?? null;
  }

  // ---------------------------------------------------------------------------
  // Blocks
  // ---------------------------------------------------------------------------

  private blockViolation(sq: Square | null): EngineErrorCode | null {
    if (sq === null || !isPlayableSquare(sq)) {
      return EngineErrorCode.RULES_BLOCK_OFF_BOARD;
    }
    if (this.gameStarted()) {
      return EngineErrorCode.RULES_BLOCK_AFTER_START;
    }
    if ([sq, ...reflectionsOf(sq)].some((s) => this.cells[s] !== 'empty')) {
      return EngineErrorCode.RULES_BLOCK_SQUARE_OCCUPIED;
    }
    return null;
  }

  /**
   * True iff a block may be placed at SQUARE: before the first move, with
   * the square and each of its mirror images empty.
   */
  legalBlock(square: Square | string): boolean {
    const sq = typeof square === 'string' ? parseSquare(square) : square;
    return this.blockViolation(sq) === null;
  }

  /**
   * Block SQUARE together with its reflections across the middle row, the
   * middle column and the centre point. Places 4 squares off the axes, 2 on
   * the middle row or column, 1 at d4. Returns the squares blocked.
   *
   * @throws IllegalBlock when {@link legalBlock} is false.
   */
  placeBlock(square: Square | string): Square[] {
    const sq = typeof square === 'string' ? parseSquare(square) : square;
    const violation = this.blockViolation(sq);
    if (sq === null || violation !== null) {
      throw new IllegalBlock(
        violation ?? EngineErrorCode.RULES_BLOCK_OFF_BOARD,
        `Illegal block placement: ${typeof square === 'string' ? square : formatSquare(square)}`,
        { square }
      );
    }

    const placed = [sq, ...reflectionsOf(sq)];
    for (const s of placed) {
      this.cells[s] = 'blocked';
      this.counts.empty -= 1;
      this.counts.blocked += 1;
    }

    this.updateWinner();
    this.announce();
    return placed;
  }

  // ---------------------------------------------------------------------------
  // Display / identity
  // ---------------------------------------------------------------------------

  /**
   * Text depiction: rows 7 down to 1, columns a to g, one of `r b X -` per
   * cell. With LEGEND, row numbers lead each line and a column line follows.
   */
  toString(legend = false): string {
    let out = '';
    for (let row = SIDE - 1; row >= 0; row--) {
      let line = legend ? ROW_LABELS[row] : '';
      line += ' ';
      for (let col = 0; col < SIDE; col++) {
        line += ` ${CELL_CHARS[this.cells[squareIndex(col, row)]]}`;
      }
      out += `${line}\n`;
    }
    if (legend) {
      out += COLUMN_LEGEND;
    }
    return out;
  }

  /** Compact key of the playable grid plus the side to move. */
  positionKey(): string {
    let key = this.sideToMove === 'red' ? 'r:' : 'b:';
    for (const sq of PLAYABLE_SQUARES) {
      key += CELL_CHARS[this.cells[sq]];
    }
    return key;
  }

  /** Same grid and same side to move. */
  equals(other: Board): boolean {
    return this.positionKey() === other.positionKey();
  }

  // ---------------------------------------------------------------------------
  // Notification
  // ---------------------------------------------------------------------------

  /** Replace the observer and notify it of the current state. */
  setNotifier(notifier: BoardNotifier | null): void {
    this.notifier = notifier ?? NOOP_NOTIFIER;
    this.announce();
  }

  private announce(): void {
    this.notifier(this);
  }
}
