import { Chess, SQUARES, type Color, type PieceSymbol, type Square } from 'chess.js';

import { PIECE, oppositeSide } from '@chessduel/types';
import type { BoardCapability, Move, PieceCode, Side } from '@chessduel/types';

import { IllegalMoveError, InvalidFenError, InvalidMoveNotationError } from '../errors.js';
import {
  createMove,
  formatCoordinateMove,
  parseSquare,
  squareLabel,
  toPromotionPiece,
} from '../moves/coordinate-move.js';

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

const PIECE_CODES: Record<PieceSymbol, number> = {
  p: PIECE.PAWN,
  r: PIECE.ROOK,
  n: PIECE.KNIGHT,
  b: PIECE.BISHOP,
  q: PIECE.QUEEN,
  k: PIECE.KING,
};

function toColor(side: Side): Color {
  return side === 'white' ? 'w' : 'b';
}

function toSide(color: Color): Side {
  return color === 'w' ? 'white' : 'black';
}

function toSquare(rank: number, file: number): Square {
  const label = squareLabel(rank, file);
  const square = SQUARES.find((candidate) => candidate === label);
  if (!square) {
    throw new InvalidMoveNotationError(label);
  }
  return square;
}

/**
 * Rewrite the side-to-move field of a FEN, dropping the en passant square
 * (it is only meaningful for the side that was originally to move)
 */
function withSideToMove(fen: string, color: Color): string {
  const fields = fen.split(' ');
  fields[1] = color;
  fields[3] = '-';
  return fields.join(' ');
}

/**
 * A chess board backed by chess.js
 *
 * Implements the board capability used by the turn loop. chess.js passes
 * the move on every `move()` call; this wrapper keeps its own notion of the
 * mover so that applying a move and advancing the turn stay separate steps.
 */
export class ChessBoard implements BoardCapability {
  private chess: Chess;
  private mover: Side;

  constructor(fen?: string) {
    if (fen) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(`Invalid FEN: ${fen}`);
      }
    } else {
      this.chess = new Chess();
    }
    this.mover = toSide(this.chess.turn());
  }

  /**
   * Create a board in the standard starting position
   */
  static startingPosition(): ChessBoard {
    return new ChessBoard();
  }

  /**
   * Create a board from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessBoard {
    return new ChessBoard(fen);
  }

  pieceAt(rank: number, file: number): PieceCode {
    const piece = this.chess.get(toSquare(rank, file));
    if (!piece) return 0;
    const code = PIECE_CODES[piece.type];
    return piece.color === 'w' ? code : -code;
  }

  /**
   * Apply a move for whichever side owns the piece on the source square
   *
   * A pawn reaching the last rank without an explicit promotion becomes a queen.
   * @throws IllegalMoveError if the source is empty or the move is not legal
   */
  applyMove(move: Move): void {
    const from = toSquare(move.fromRank, move.fromFile);
    const to = toSquare(move.toRank, move.toFile);
    const notation = formatCoordinateMove(move);
    const fenBefore = this.chess.fen();

    const piece = this.chess.get(from);
    if (!piece) {
      throw new IllegalMoveError(notation, fenBefore);
    }

    const position = this.positionFor(piece.color);
    const reachesLastRank = move.toRank === 0 || move.toRank === 7;
    const promotion = move.promotion ?? (piece.type === 'p' && reachesLastRank ? 'q' : undefined);

    try {
      position.move(promotion ? { from, to, promotion } : { from, to });
    } catch {
      throw new IllegalMoveError(notation, fenBefore);
    }
    this.chess = position;
  }

  legalMoves(side: Side): Move[] {
    return this.positionFor(toColor(side))
      .moves({ verbose: true })
      .map((candidate) => {
        const from = parseSquare(candidate.from);
        const to = parseSquare(candidate.to);
        if (!from || !to) {
          throw new InvalidMoveNotationError(`${candidate.from}${candidate.to}`);
        }
        return createMove(
          from.rank,
          from.file,
          to.rank,
          to.file,
          toPromotionPiece(candidate.promotion),
        );
      });
  }

  isInCheck(side: Side): boolean {
    return this.positionFor(toColor(side)).isCheck();
  }

  isCheckmate(side: Side): boolean {
    return this.positionFor(toColor(side)).isCheckmate();
  }

  toCoordinateLabel(rank: number, file: number): string {
    return squareLabel(rank, file);
  }

  /**
   * Piece placement, one line per rank from the eighth down,
   * FEN letters for pieces and '.' for empty squares
   */
  snapshot(): string {
    return this.chess
      .board()
      .map((row) =>
        row
          .map((piece) => {
            if (!piece) return '.';
            return piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
          })
          .join(''),
      )
      .join('\n');
  }

  resetToInitial(): void {
    this.chess.reset();
    this.mover = 'white';
  }

  advanceTurn(): void {
    this.mover = oppositeSide(this.mover);
  }

  currentMover(): Side {
    return this.mover;
  }

  clone(): ChessBoard {
    const copy = new ChessBoard(this.chess.fen());
    copy.mover = this.mover;
    return copy;
  }

  /**
   * The underlying position with `color` to move. Returns the live instance
   * when it already has that side to move, otherwise a detached copy.
   */
  private positionFor(color: Color): Chess {
    if (this.chess.turn() === color) {
      return this.chess;
    }
    const fen = withSideToMove(this.chess.fen(), color);
    try {
      return new Chess(fen);
    } catch {
      throw new InvalidFenError(`Cannot hand the move to ${toSide(color)}: ${fen}`);
    }
  }
}
