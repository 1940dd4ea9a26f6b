import { describe, it, expect } from 'vitest';

import { ChessBoard } from '@chessduel/board';
import { createTrackingLogger } from '@chessduel/test-utils';

import { NotationReconstructor } from '../notation/reconstructor.js';

function reconstruct(moves: string[], board = new ChessBoard()): string {
  return new NotationReconstructor(createTrackingLogger()).reconstruct(moves, board);
}

describe('NotationReconstructor', () => {
  it('numbers move pairs and leaves a trailing White move on its own line', () => {
    expect(reconstruct(['e2e4', 'e7e5', 'g1f3'])).toBe('1. e4 e5\n2. Nf3');
  });

  it('returns an empty string for an empty game', () => {
    expect(reconstruct([])).toBe('');
  });

  it('marks captures with the pawn file or the piece letter', () => {
    expect(reconstruct(['e2e4', 'd7d5', 'e4d5', 'd8d5'])).toBe('1. e4 d5\n2. exd5 Qxd5');
  });

  it('marks check and checkmate', () => {
    expect(reconstruct(['e2e4', 'f7f6', 'd1h5'])).toBe('1. e4 f6\n2. Qh5+');
    expect(reconstruct(['f2f3', 'e7e5', 'g2g4', 'd8h4'])).toBe('1. f3 e5\n2. g4 Qh4#');
  });

  it('writes kingside castling as O-O', () => {
    const moves = ['e2e4', 'e7e5', 'g1f3', 'b8c6', 'f1c4', 'g8f6', 'e1g1'];
    expect(reconstruct(moves).split('\n')).toEqual([
      '1. e4 e5',
      '2. Nf3 Nc6',
      '3. Bc4 Nf6',
      '4. O-O',
    ]);
  });

  it('writes queenside castling as O-O-O for both sides', () => {
    const moves = [
      'd2d4', 'd7d5',
      'b1c3', 'b8c6',
      'c1f4', 'c8f5',
      'd1d2', 'd8d7',
      'e1c1', 'e8c8',
    ];
    expect(reconstruct(moves).split('\n').at(-1)).toBe('5. O-O-O O-O-O');
  });

  it('writes en passant as a pawn capture', () => {
    const moves = ['e2e4', 'a7a6', 'e4e5', 'd7d5', 'e5d6'];
    expect(reconstruct(moves).split('\n').at(-1)).toBe('3. exd6');
  });

  it('writes promotions with the new piece', () => {
    const board = ChessBoard.fromFen('k7/4P3/8/8/8/8/8/7K w - - 0 1');
    expect(reconstruct(['e7e8'], board)).toBe('1. e8=Q+');
  });

  it('skips a move whose source square is empty and logs it', () => {
    const logger = createTrackingLogger();
    const notation = new NotationReconstructor(logger).reconstruct(
      ['e3e4', 'e7e5'],
      new ChessBoard(),
    );

    expect(notation).toBe('1. ... e5');
    expect(logger.messages('warn')).toEqual(['Skipping move 1 "e3e4": no piece on e3']);
  });

  it('skips illegal and malformed entries', () => {
    const logger = createTrackingLogger();
    const notation = new NotationReconstructor(logger).reconstruct(
      ['e2e4', 'e7e4', 'xyz'],
      new ChessBoard(),
    );

    expect(notation).toBe('1. e4');
    expect(logger.messages('warn')).toHaveLength(2);
    expect(logger.messages('warn')[1]).toBe('Skipping move 3 "xyz": not a coordinate move');
  });
});
