import {
  CENTER_SQUARE,
  PLAYABLE_SQUARES,
  formatSquare,
  isPlayableSquare,
  neighbor,
  parseSquare,
  reflectionsOf,
  squareCol,
  squareDistance,
  squareIndex,
  squarePosition,
  squareRow,
} from '../../../src/shared/engine/squares';
import { sq } from '../../utils/fixtures';

describe('squares', () => {
  describe('bordered grid indexing', () => {
    it('places a1 two rings in from the corner of the 11x11 grid', () => {
      expect(squareIndex(0, 0)).toBe(24);
      expect(squareIndex(6, 6)).toBe(96);
      expect(CENTER_SQUARE).toBe(60);
    });

    it('round-trips column and row', () => {
      const s = squareIndex(4, 2);
      expect(squareCol(s)).toBe(4);
      expect(squareRow(s)).toBe(2);
      expect(squarePosition(s)).toEqual({ col: 4, row: 2 });
    });

    it('offsets by columns and rows', () => {
      expect(neighbor(sq('a1'), 1, 1)).toBe(sq('b2'));
      expect(neighbor(sq('d4'), -2, 2)).toBe(sq('b6'));
      expect(isPlayableSquare(neighbor(sq('a1'), -2, -2))).toBe(false);
    });

    it('lists every playable square a1..g1, a2..g2 and on', () => {
      expect(PLAYABLE_SQUARES).toHaveLength(49);
      expect(formatSquare(PLAYABLE_SQUARES[0])).toBe('a1');
      expect(formatSquare(PLAYABLE_SQUARES[7])).toBe('a2');
      expect(formatSquare(PLAYABLE_SQUARES[48])).toBe('g7');
    });
  });

  describe('isPlayableSquare', () => {
    it('rejects border cells and out-of-range indices', () => {
      expect(isPlayableSquare(0)).toBe(false);
      expect(isPlayableSquare(squareIndex(7, 0))).toBe(false);
      expect(isPlayableSquare(-1)).toBe(false);
      expect(isPlayableSquare(121)).toBe(false);
      expect(isPlayableSquare(2.5)).toBe(false);
      expect(isPlayableSquare(sq('g7'))).toBe(true);
    });
  });

  describe('squareDistance', () => {
    it('is the king-move distance', () => {
      expect(squareDistance(sq('a1'), sq('a2'))).toBe(1);
      expect(squareDistance(sq('a1'), sq('b2'))).toBe(1);
      expect(squareDistance(sq('a1'), sq('c2'))).toBe(2);
      expect(squareDistance(sq('a1'), sq('c3'))).toBe(2);
      expect(squareDistance(sq('a1'), sq('a4'))).toBe(3);
    });
  });

  describe('formatSquare / parseSquare', () => {
    it('formats playable squares and marks border cells', () => {
      expect(formatSquare(sq('e3'))).toBe('e3');
      expect(formatSquare(0)).toBe('??');
    });

    it('rejects names off the 7x7 board', () => {
      expect(parseSquare('h1')).toBeNull();
      expect(parseSquare('a8')).toBeNull();
      expect(parseSquare('a0')).toBeNull();
      expect(parseSquare('a')).toBeNull();
      expect(parseSquare('a11')).toBeNull();
      expect(parseSquare('A1')).toBeNull();
    });
  });

  describe('reflectionsOf', () => {
    it('gives three mirror images for a square off both axes', () => {
      expect(reflectionsOf(sq('b2')).map(formatSquare)).toEqual(['b6', 'f2', 'f6']);
      expect(reflectionsOf(sq('a1')).map(formatSquare)).toEqual(['a7', 'g1', 'g7']);
    });

    it('gives one mirror image on the middle row or column', () => {
      expect(reflectionsOf(sq('d2')).map(formatSquare)).toEqual(['d6']);
      expect(reflectionsOf(sq('b4')).map(formatSquare)).toEqual(['f4']);
    });

    it('gives none at the centre', () => {
      expect(reflectionsOf(CENTER_SQUARE)).toEqual([]);
    });
  });
});
