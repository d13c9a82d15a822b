/**
 * Engine Domain Errors - Structured error types for the Ataxx engine
 *
 * Every error the Board or the search layer raises is a caller contract
 * violation: the Board never self-corrects an illegal request, it throws and
 * leaves its state untouched.
 *
 * Error Categories:
 * - **IllegalMove**: move application with a move that fails `Board.legal`,
 *   or move text that cannot be parsed
 * - **IllegalBlock**: block placement after the first move, on an occupied
 *   square, or where a mirrored square is occupied
 * - **InvalidState**: requests that make no sense for the current state
 *   (undo with an empty history, searching a position with no legal move)
 *
 * Usage:
 * ```typescript
 * import { IllegalMove, EngineErrorCode } from './errors';
 *
 * throw new IllegalMove(EngineErrorCode.RULES_ILLEGAL_MOVE, 'Illegal move: a1-a4', {
 *   move: 'a1-a4',
 * });
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Game rule violations
 * - STATE_*: Requests that do not fit the current board state
 * - MOVE_*: Malformed move input
 * - BOARD_*: Malformed board descriptions
 * - INTERNAL_*: Defects
 */
export enum EngineErrorCode {
  /** Move fails the legality predicate */
  RULES_ILLEGAL_MOVE = 'RULES_ILLEGAL_MOVE',
  /** Block placed after the first move */
  RULES_BLOCK_AFTER_START = 'RULES_BLOCK_AFTER_START',
  /** Block placed on (or mirrored onto) a non-empty square */
  RULES_BLOCK_SQUARE_OCCUPIED = 'RULES_BLOCK_SQUARE_OCCUPIED',
  /** Block square is not on the playable board */
  RULES_BLOCK_OFF_BOARD = 'RULES_BLOCK_OFF_BOARD',

  /** Undo requested with no recorded move */
  STATE_NOTHING_TO_UNDO = 'STATE_NOTHING_TO_UNDO',
  /** Search or player asked to move where no non-pass move exists */
  STATE_NO_LEGAL_MOVES = 'STATE_NO_LEGAL_MOVES',
  /** Request made for the side not on move */
  STATE_WRONG_SIDE_TO_MOVE = 'STATE_WRONG_SIDE_TO_MOVE',
  /** Game already has a winner */
  STATE_GAME_OVER = 'STATE_GAME_OVER',

  /** Move text is not "-" or "<col><row>-<col><row>" */
  MOVE_MALFORMED_NOTATION = 'MOVE_MALFORMED_NOTATION',

  /** Board text does not describe a 7x7 grid of r, b, X and - */
  BOARD_MALFORMED_LAYOUT = 'BOARD_MALFORMED_LAYOUT',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Request does not fit the current game state',
  MOVE_: 'Malformed move input',
  BOARD_: 'Malformed board description',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g. 'Board', 'Search') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Raised by move application when the move fails the legality predicate,
 * and by the notation parser for text that does not denote a move.
 */
export class IllegalMove extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'IllegalMove';
    Object.setPrototypeOf(this, IllegalMove.prototype);
  }
}

/**
 * Raised by block placement after the first move, on a square that is not
 * empty, or when one of the mirrored squares is not empty.
 */
export class IllegalBlock extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'IllegalBlock';
    Object.setPrototypeOf(this, IllegalBlock.prototype);
  }
}

/**
 * Raised when a request does not fit the current state: undo with nothing
 * to undo, a search started where only a pass is possible, a session stepped
 * after the game ended.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isIllegalMove(error: unknown): error is IllegalMove {
  return error instanceof IllegalMove;
}

export function isIllegalBlock(error: unknown): error is IllegalBlock {
  return error instanceof IllegalBlock;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
