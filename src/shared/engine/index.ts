// =============================================================================
// ATAXX ENGINE - PUBLIC API
// =============================================================================
// Hosts (game sessions, AI players, tooling) should only import from this
// file. Everything here is synchronous and free of I/O.
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Player,
  PieceColor,
  GameOutcome,
  Square,
  Position,
  MoveType,
  PassMove,
  PieceMove,
  Move,
} from '../types/game';

export {
  SIDE,
  BORDER,
  EXTENDED_SIDE,
  GRID_CELLS,
  BOARD_AREA,
  JUMP_LIMIT,
  opponent,
  isPlayer,
} from '../types/game';

// =============================================================================
// GEOMETRY
// =============================================================================

export {
  squareIndex,
  neighbor,
  squareCol,
  squareRow,
  squarePosition,
  isPlayableSquare,
  squareDistance,
  formatSquare,
  parseSquare,
  reflectionsOf,
  CENTER_SQUARE,
  PLAYABLE_SQUARES,
} from './squares';

// =============================================================================
// MOVES & NOTATION
// =============================================================================

export { PASS, createMove, isPass, isExtend, isJump, movesEqual } from './moves';
export { PASS_NOTATION, formatMove, tryParseMove, parseMove, formatMoveList } from './notation';

// =============================================================================
// BOARD
// =============================================================================

export { Board } from './Board';
export type { BoardNotifier, BoardOptions } from './Board';
export { UndoLog } from './undoLog';
export type { UndoEntry, UndoGroup, UndoSnapshot } from './undoLog';

// =============================================================================
// VICTORY, MOVE GENERATION & EVALUATION
// =============================================================================

export { evaluateVictory } from './victoryLogic';
export type { VictoryReason, VictoryResult, VictoryView } from './victoryLogic';
export { enumerateLegalMoves, hasLegalMove } from './moveGeneration';
export { WINNING_VALUE, INFINITY_SCORE, staticScore } from './heuristicEvaluation';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  IllegalMove,
  IllegalBlock,
  InvalidState,
  isEngineError,
  isIllegalMove,
  isIllegalBlock,
  isInvalidState,
  wrapEngineError,
  ERROR_CATEGORY_DESCRIPTIONS,
} from './errors';
export type { EngineErrorJSON } from './errors';
