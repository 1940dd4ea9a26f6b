/**
 * Notation Reconstructor
 *
 * Replays a list of coordinate moves on a board and writes them out in
 * algebraic notation: piece letters, captures, castling, promotion,
 * check and checkmate.
 */

import type { BoardCapability, Logger, Move, Side } from '@chessduel/types';
import { PIECE, oppositeSide } from '@chessduel/types';
import { IllegalMoveError, InvalidMoveNotationError, parseCoordinateMove } from '@chessduel/board';

const PIECE_LETTERS: Record<number, string> = {
  [PIECE.ROOK]: 'R',
  [PIECE.KNIGHT]: 'N',
  [PIECE.BISHOP]: 'B',
  [PIECE.QUEEN]: 'Q',
  [PIECE.KING]: 'K',
};

function homeRank(side: Side): number {
  return side === 'white' ? 7 : 0;
}

/**
 * A king moving two files sideways from the e-file of its home rank
 */
function castlingNotation(move: Move, kind: number, side: Side): string | undefined {
  if (kind !== PIECE.KING) return undefined;
  if (move.fromFile !== 4 || move.fromRank !== homeRank(side) || move.toRank !== move.fromRank) {
    return undefined;
  }
  if (move.toFile === 6) return 'O-O';
  if (move.toFile === 2) return 'O-O-O';
  return undefined;
}

export class NotationReconstructor {
  constructor(private readonly logger: Logger = console) {}

  /**
   * Replay `moves` on `board`, which should hold the position they were
   * played from, and return one line per move pair: `<N>. <white> <black>`.
   *
   * Entries that cannot be replayed are logged and left out. A pair whose
   * White half was left out shows `...` in its place.
   */
  reconstruct(moves: readonly string[], board: BoardCapability): string {
    const pairs: Array<[string | undefined, string | undefined]> = [];

    moves.forEach((raw, index) => {
      const notation = this.notate(raw, index, board);
      if (notation === undefined) return;

      const pairIndex = Math.floor(index / 2);
      const pair = pairs[pairIndex] ?? [undefined, undefined];
      pair[index % 2] = notation;
      pairs[pairIndex] = pair;
    });

    const lines: string[] = [];
    pairs.forEach(([white, black], pairIndex) => {
      const number = pairIndex + 1;
      lines.push(
        black === undefined
          ? `${number}. ${white ?? '...'}`
          : `${number}. ${white ?? '...'} ${black}`,
      );
    });

    return lines.join('\n');
  }

  private notate(raw: string, index: number, board: BoardCapability): string | undefined {
    let move: Move;
    try {
      move = parseCoordinateMove(raw);
    } catch (err) {
      if (err instanceof InvalidMoveNotationError) {
        this.skip(raw, index, 'not a coordinate move');
        return undefined;
      }
      throw err;
    }

    const piece = board.pieceAt(move.fromRank, move.fromFile);
    if (piece === 0) {
      this.skip(raw, index, `no piece on ${board.toCoordinateLabel(move.fromRank, move.fromFile)}`);
      return undefined;
    }

    const side: Side = piece > 0 ? 'white' : 'black';
    const kind = Math.abs(piece);
    let notation = castlingNotation(move, kind, side) ?? this.describe(move, kind, board);

    try {
      board.applyMove(move);
    } catch (err) {
      if (err instanceof IllegalMoveError) {
        this.skip(raw, index, err.message);
        return undefined;
      }
      throw err;
    }
    board.advanceTurn();

    const opponent = oppositeSide(side);
    if (board.isCheckmate(opponent)) {
      notation += '#';
    } else if (board.isInCheck(opponent)) {
      notation += '+';
    }
    return notation;
  }

  private describe(move: Move, kind: number, board: BoardCapability): string {
    const destination = board.toCoordinateLabel(move.toRank, move.toFile);
    const occupied = board.pieceAt(move.toRank, move.toFile) !== 0;

    if (kind !== PIECE.PAWN) {
      return `${PIECE_LETTERS[kind] ?? ''}${occupied ? 'x' : ''}${destination}`;
    }

    // A diagonal pawn move onto an empty square is en passant
    const captures = occupied || move.fromFile !== move.toFile;
    const file = board.toCoordinateLabel(move.fromRank, move.fromFile).charAt(0);
    let notation = `${captures ? `${file}x` : ''}${destination}`;
    if (move.toRank === 0 || move.toRank === 7) {
      notation += `=${(move.promotion ?? 'q').toUpperCase()}`;
    }
    return notation;
  }

  private skip(raw: string, index: number, reason: string): void {
    this.logger.warn(`Skipping move ${index + 1} "${raw}": ${reason}`);
  }
}
