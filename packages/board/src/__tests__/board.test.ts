import { describe, it, expect } from 'vitest';

import {
  ChessBoard,
  IllegalMoveError,
  InvalidFenError,
  InvalidSquareError,
  parseCoordinateMove,
} from '../index.js';

const STARTING_SNAPSHOT = [
  'rnbqkbnr',
  'pppppppp',
  '........',
  '........',
  '........',
  '........',
  'PPPPPPPP',
  'RNBQKBNR',
].join('\n');

function play(board: ChessBoard, moves: string[]): void {
  for (const move of moves) {
    board.applyMove(parseCoordinateMove(move));
    board.advanceTurn();
  }
}

describe('ChessBoard', () => {
  describe('constructor and factory methods', () => {
    it('creates the starting position by default', () => {
      const board = new ChessBoard();
      expect(board.snapshot()).toBe(STARTING_SNAPSHOT);
      expect(board.currentMover()).toBe('white');
    });

    it('snapshots piece placement only, not the side to move', () => {
      const board = new ChessBoard();
      board.advanceTurn();

      expect(board.currentMover()).toBe('black');
      expect(board.snapshot()).toBe(STARTING_SNAPSHOT);
    });

    it('takes the mover from the FEN', () => {
      const board = ChessBoard.fromFen('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq - 0 1');
      expect(board.currentMover()).toBe('black');
    });

    it('throws InvalidFenError for invalid FEN', () => {
      expect(() => new ChessBoard('invalid')).toThrow(InvalidFenError);
    });
  });

  describe('pieceAt', () => {
    it('returns signed piece codes', () => {
      const board = ChessBoard.startingPosition();
      expect(board.pieceAt(7, 4)).toBe(6); // e1 white king
      expect(board.pieceAt(0, 4)).toBe(-6); // e8 black king
      expect(board.pieceAt(7, 1)).toBe(3); // b1 white knight
      expect(board.pieceAt(1, 0)).toBe(-1); // a7 black pawn
      expect(board.pieceAt(0, 3)).toBe(-5); // d8 black queen
      expect(board.pieceAt(4, 4)).toBe(0);
    });

    it('rejects squares off the board', () => {
      expect(() => new ChessBoard().pieceAt(8, 0)).toThrow(InvalidSquareError);
    });
  });

  describe('applyMove and turn tracking', () => {
    it('moves the piece without passing the turn', () => {
      const board = new ChessBoard();
      board.applyMove(parseCoordinateMove('e2e4'));

      expect(board.pieceAt(6, 4)).toBe(0);
      expect(board.pieceAt(4, 4)).toBe(1);
      expect(board.currentMover()).toBe('white');

      board.advanceTurn();
      expect(board.currentMover()).toBe('black');
    });

    it('moves whichever side owns the source piece', () => {
      const board = new ChessBoard();
      board.applyMove(parseCoordinateMove('e7e5'));
      expect(board.pieceAt(3, 4)).toBe(-1);
    });

    it('throws IllegalMoveError for an empty source square', () => {
      const board = new ChessBoard();
      expect(() => board.applyMove(parseCoordinateMove('e4e5'))).toThrow(IllegalMoveError);
    });

    it('throws IllegalMoveError for an illegal move and leaves the board unchanged', () => {
      const board = new ChessBoard();
      expect(() => board.applyMove(parseCoordinateMove('e2e5'))).toThrow(IllegalMoveError);
      expect(board.snapshot()).toBe(STARTING_SNAPSHOT);
    });

    it('promotes to a queen when no piece is given', () => {
      const board = ChessBoard.fromFen('k7/4P3/8/8/8/8/8/7K w - - 0 1');
      board.applyMove(parseCoordinateMove('e7e8'));
      expect(board.pieceAt(0, 4)).toBe(5);
    });

    it('honours an explicit under-promotion', () => {
      const board = ChessBoard.fromFen('k7/4P3/8/8/8/8/8/7K w - - 0 1');
      board.applyMove(parseCoordinateMove('e7e8n'));
      expect(board.pieceAt(0, 4)).toBe(3);
    });
  });

  describe('legalMoves', () => {
    it('lists twenty opening moves for either side', () => {
      const board = new ChessBoard();
      expect(board.legalMoves('white')).toHaveLength(20);
      expect(board.legalMoves('black')).toHaveLength(20);
    });

    it('lists each promotion piece separately', () => {
      const board = ChessBoard.fromFen('k7/4P3/8/8/8/8/8/7K w - - 0 1');
      const promotions = board
        .legalMoves('white')
        .filter((move) => move.fromRank === 1 && move.fromFile === 4)
        .map((move) => move.promotion)
        .sort();
      expect(promotions).toEqual(['b', 'n', 'q', 'r']);
    });
  });

  describe('check and checkmate', () => {
    it("detects fool's mate", () => {
      const board = new ChessBoard();
      play(board, ['f2f3', 'e7e5', 'g2g4', 'd8h4']);

      expect(board.currentMover()).toBe('white');
      expect(board.isInCheck('white')).toBe(true);
      expect(board.isCheckmate('white')).toBe(true);
      expect(board.isCheckmate('black')).toBe(false);
    });

    it('reports check without mate', () => {
      const board = new ChessBoard();
      play(board, ['e2e4', 'f7f6', 'd1h5']);

      expect(board.isInCheck('black')).toBe(true);
      expect(board.isCheckmate('black')).toBe(false);
      expect(board.isInCheck('white')).toBe(false);
    });
  });

  describe('toCoordinateLabel', () => {
    it('labels squares from the eighth rank down', () => {
      const board = new ChessBoard();
      expect(board.toCoordinateLabel(0, 0)).toBe('a8');
      expect(board.toCoordinateLabel(6, 4)).toBe('e2');
      expect(board.toCoordinateLabel(7, 7)).toBe('h1');
    });
  });

  describe('resetToInitial and clone', () => {
    it('restores the starting position and mover', () => {
      const board = new ChessBoard();
      play(board, ['e2e4', 'e7e5', 'g1f3']);

      board.resetToInitial();
      expect(board.snapshot()).toBe(STARTING_SNAPSHOT);
      expect(board.currentMover()).toBe('white');
    });

    it('produces an independent copy with the same mover', () => {
      const board = new ChessBoard();
      play(board, ['e2e4']);

      const copy = board.clone();
      expect(copy.currentMover()).toBe('black');
      copy.applyMove(parseCoordinateMove('e7e5'));

      expect(board.pieceAt(1, 4)).toBe(-1);
      expect(copy.pieceAt(1, 4)).toBe(0);
    });
  });
});
