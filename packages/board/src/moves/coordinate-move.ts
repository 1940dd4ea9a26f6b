/**
 * Coordinate move codec
 *
 * Converts between the zero-based Move tuple and engine-style coordinate
 * strings ("e2e4", "e7e8q").
 */

import type { Move, PromotionPiece } from '@chessduel/types';

import { InvalidMoveNotationError, InvalidSquareError } from '../errors.js';

const FILES = 'abcdefgh';

const COORDINATE_MOVE_PATTERN = /^([a-h])([1-8])([a-h])([1-8])([qrbn])?$/;

/**
 * Whether a rank/file pair lies on the board
 */
export function isOnBoard(rank: number, file: number): boolean {
  return Number.isInteger(rank) && Number.isInteger(file) && rank >= 0 && rank < 8 && file >= 0 && file < 8;
}

/**
 * Square label for zero-based coordinates, e.g. (6, 4) -> "e2"
 * @throws InvalidSquareError if the coordinates are off the board
 */
export function squareLabel(rank: number, file: number): string {
  if (!isOnBoard(rank, file)) {
    throw new InvalidSquareError(rank, file);
  }
  return `${FILES.charAt(file)}${8 - rank}`;
}

/**
 * Zero-based coordinates of a square label, e.g. "e2" -> { rank: 6, file: 4 }
 */
export function parseSquare(label: string): { rank: number; file: number } | null {
  const match = /^([a-h])([1-8])$/.exec(label);
  if (!match) return null;
  return {
    rank: 8 - Number(match[2]),
    file: FILES.indexOf(match[1] ?? ''),
  };
}

/**
 * Create an immutable move
 * @throws InvalidSquareError if either square is off the board
 */
export function createMove(
  fromRank: number,
  fromFile: number,
  toRank: number,
  toFile: number,
  promotion?: PromotionPiece,
): Move {
  if (!isOnBoard(fromRank, fromFile)) throw new InvalidSquareError(fromRank, fromFile);
  if (!isOnBoard(toRank, toFile)) throw new InvalidSquareError(toRank, toFile);

  const move: Move = promotion
    ? { fromRank, fromFile, toRank, toFile, promotion }
    : { fromRank, fromFile, toRank, toFile };
  return Object.freeze(move);
}

/**
 * Element-wise move equality
 */
export function movesEqual(a: Move, b: Move): boolean {
  return (
    a.fromRank === b.fromRank &&
    a.fromFile === b.fromFile &&
    a.toRank === b.toRank &&
    a.toFile === b.toFile &&
    a.promotion === b.promotion
  );
}

/**
 * Decode a coordinate move string
 * @throws InvalidMoveNotationError if the string is not a coordinate move
 */
export function parseCoordinateMove(notation: string): Move {
  const match = COORDINATE_MOVE_PATTERN.exec(notation.trim());
  if (!match) {
    throw new InvalidMoveNotationError(notation);
  }

  const [, fromFile = '', fromRank = '', toFile = '', toRank = '', promotion] = match;
  return createMove(
    8 - Number(fromRank),
    FILES.indexOf(fromFile),
    8 - Number(toRank),
    FILES.indexOf(toFile),
    toPromotionPiece(promotion),
  );
}

/**
 * Encode a move as a coordinate string
 */
export function formatCoordinateMove(move: Move): string {
  const from = squareLabel(move.fromRank, move.fromFile);
  const to = squareLabel(move.toRank, move.toFile);
  return `${from}${to}${move.promotion ?? ''}`;
}

/**
 * Narrow a promotion letter, anything else becomes undefined
 */
export function toPromotionPiece(value: string | undefined): PromotionPiece | undefined {
  switch (value) {
    case 'q':
    case 'r':
    case 'b':
    case 'n':
      return value;
    default:
      return undefined;
  }
}
