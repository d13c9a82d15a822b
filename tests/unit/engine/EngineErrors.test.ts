/**
 * Test suite for src/shared/engine/errors.ts
 *
 * Covers the error classes, codes, type guards and wrapEngineError.
 */

import {
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
} from '../../../src/shared/engine/errors';

describe('EngineErrors', () => {
  describe('EngineError base class', () => {
    it('should create an EngineError with all fields', () => {
      const error = new EngineError(
        EngineErrorCode.RULES_ILLEGAL_MOVE,
        'Illegal move: a1-a4',
        { move: 'a1-a4' },
        'Board'
      );

      expect(error.code).toBe(EngineErrorCode.RULES_ILLEGAL_MOVE);
      expect(error.message).toBe('Illegal move: a1-a4');
      expect(error.context).toEqual({ move: 'a1-a4' });
      expect(error.domain).toBe('Board');
      expect(error.name).toBe('EngineError');
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it('should use default domain when not specified', () => {
      const error = new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'Assertion failed');

      expect(error.domain).toBe('Engine');
      expect(error.context).toEqual({});
    });

    it('should return category description based on error code prefix', () => {
      expect(new EngineError(EngineErrorCode.RULES_BLOCK_AFTER_START, 'x').category).toBe(
        'Game rule violation'
      );
      expect(new EngineError(EngineErrorCode.STATE_NOTHING_TO_UNDO, 'x').category).toBe(
        'Request does not fit the current game state'
      );
      expect(new EngineError(EngineErrorCode.MOVE_MALFORMED_NOTATION, 'x').category).toBe(
        'Malformed move input'
      );
      expect(new EngineError(EngineErrorCode.BOARD_MALFORMED_LAYOUT, 'x').category).toBe(
        'Malformed board description'
      );
      expect(new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'x').category).toBe(
        'Internal engine error (bug)'
      );
    });

    it('should have a description for every code prefix', () => {
      for (const code of Object.values(EngineErrorCode)) {
        const prefix = code.split('_')[0] + '_';
        expect(ERROR_CATEGORY_DESCRIPTIONS[prefix]).toBeDefined();
      }
    });

    it('should serialize to JSON correctly', () => {
      const error = new EngineError(
        EngineErrorCode.STATE_GAME_OVER,
        'Game is already over',
        { winner: 'red' },
        'GameSession'
      );

      const json = error.toJSON();

      expect(json).toEqual({
        error: true,
        type: 'EngineError',
        code: 'STATE_GAME_OVER',
        message: 'Game is already over',
        domain: 'GameSession',
        context: { winner: 'red' },
        category: 'Request does not fit the current game state',
        timestamp: error.timestamp.toISOString(),
      });
    });

    it('should be an instance of Error', () => {
      const error = new EngineError(EngineErrorCode.INTERNAL_ASSERTION_FAILED, 'Test');
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(EngineError);
    });
  });

  describe('specific error classes', () => {
    it('IllegalMove defaults to the Board domain', () => {
      const error = new IllegalMove(EngineErrorCode.RULES_ILLEGAL_MOVE, 'Illegal move: -');
      expect(error.name).toBe('IllegalMove');
      expect(error.domain).toBe('Board');
      expect(error).toBeInstanceOf(EngineError);
    });

    it('IllegalBlock defaults to the Board domain', () => {
      const error = new IllegalBlock(EngineErrorCode.RULES_BLOCK_SQUARE_OCCUPIED, 'occupied');
      expect(error.name).toBe('IllegalBlock');
      expect(error.domain).toBe('Board');
    });

    it('InvalidState defaults to the State domain', () => {
      const error = new InvalidState(EngineErrorCode.STATE_NOTHING_TO_UNDO, 'No move to undo');
      expect(error.name).toBe('InvalidState');
      expect(error.domain).toBe('State');
      expect(error.toJSON().type).toBe('InvalidState');
    });
  });

  describe('type guards', () => {
    const move = new IllegalMove(EngineErrorCode.RULES_ILLEGAL_MOVE, 'm');
    const block = new IllegalBlock(EngineErrorCode.RULES_BLOCK_OFF_BOARD, 'b');
    const state = new InvalidState(EngineErrorCode.STATE_GAME_OVER, 's');

    it('should tell the subclasses apart', () => {
      expect(isIllegalMove(move)).toBe(true);
      expect(isIllegalMove(block)).toBe(false);
      expect(isIllegalBlock(block)).toBe(true);
      expect(isIllegalBlock(state)).toBe(false);
      expect(isInvalidState(state)).toBe(true);
      expect(isInvalidState(move)).toBe(false);
    });

    it('should recognise every subclass as an EngineError', () => {
      expect([move, block, state].every(isEngineError)).toBe(true);
      expect(isEngineError(new Error('plain'))).toBe(false);
      expect(isEngineError('string')).toBe(false);
    });
  });

  describe('wrapEngineError', () => {
    it('should return EngineErrors unchanged', () => {
      const original = new InvalidState(EngineErrorCode.STATE_GAME_OVER, 'over');
      expect(wrapEngineError(original)).toBe(original);
    });

    it('should wrap plain errors as internal failures', () => {
      const wrapped = wrapEngineError(new Error('boom'), 'GameSession', { player: 'red' });

      expect(wrapped).toBeInstanceOf(EngineError);
      expect(wrapped.code).toBe(EngineErrorCode.INTERNAL_ASSERTION_FAILED);
      expect(wrapped.message).toBe('boom');
      expect(wrapped.domain).toBe('GameSession');
      expect(wrapped.context.player).toBe('red');
      expect(typeof wrapped.context.originalStack).toBe('string');
    });

    it('should wrap non-Error values by string conversion', () => {
      const wrapped = wrapEngineError(42);
      expect(wrapped.message).toBe('42');
      expect(wrapped.domain).toBe('Engine');
      expect(wrapped.context.originalStack).toBeUndefined();
    });
  });
});
