import { describe, it, expect } from 'vitest';

import {
  createMove,
  formatCoordinateMove,
  InvalidMoveNotationError,
  InvalidSquareError,
  movesEqual,
  parseCoordinateMove,
  parseSquare,
  squareLabel,
} from '../index.js';

describe('coordinate moves', () => {
  describe('parseCoordinateMove', () => {
    it('decodes a plain move', () => {
      expect(parseCoordinateMove('e2e4')).toEqual({
        fromRank: 6,
        fromFile: 4,
        toRank: 4,
        toFile: 4,
      });
    });

    it('decodes a promotion', () => {
      const move = parseCoordinateMove('a7a8q');
      expect(move.fromRank).toBe(1);
      expect(move.toRank).toBe(0);
      expect(move.promotion).toBe('q');
    });

    it('returns frozen moves', () => {
      expect(Object.isFrozen(parseCoordinateMove('g1f3'))).toBe(true);
    });

    it('rejects malformed input', () => {
      expect(() => parseCoordinateMove('e9e4')).toThrow(InvalidMoveNotationError);
      expect(() => parseCoordinateMove('e2')).toThrow(InvalidMoveNotationError);
      expect(() => parseCoordinateMove('e7e8k')).toThrow(InvalidMoveNotationError);
      expect(() => parseCoordinateMove('')).toThrow(InvalidMoveNotationError);
    });
  });

  describe('formatCoordinateMove', () => {
    it('encodes moves with and without promotion', () => {
      expect(formatCoordinateMove(createMove(7, 6, 5, 5))).toBe('g1f3');
      expect(formatCoordinateMove(createMove(6, 0, 7, 0, 'n'))).toBe('a2a1n');
    });
  });

  describe('createMove', () => {
    it('rejects coordinates off the board', () => {
      expect(() => createMove(-1, 0, 0, 0)).toThrow(InvalidSquareError);
      expect(() => createMove(0, 0, 0, 8)).toThrow(InvalidSquareError);
    });
  });

  describe('movesEqual', () => {
    it('compares element-wise', () => {
      expect(movesEqual(createMove(6, 4, 4, 4), parseCoordinateMove('e2e4'))).toBe(true);
      expect(movesEqual(createMove(6, 4, 5, 4), parseCoordinateMove('e2e4'))).toBe(false);
    });

    it('distinguishes promotion pieces', () => {
      expect(movesEqual(parseCoordinateMove('b7b8q'), parseCoordinateMove('b7b8n'))).toBe(false);
      expect(movesEqual(parseCoordinateMove('b7b8q'), parseCoordinateMove('b7b8'))).toBe(false);
    });
  });

  describe('squares', () => {
    it('labels and parses squares', () => {
      expect(squareLabel(0, 0)).toBe('a8');
      expect(squareLabel(7, 7)).toBe('h1');
      expect(parseSquare('c6')).toEqual({ rank: 2, file: 2 });
      expect(parseSquare('z9')).toBeNull();
    });
  });
});
