/**
 * Board contracts
 *
 * The rules of chess are consumed, never implemented, by the orchestration
 * layer. Everything it needs from a board goes through BoardCapability.
 */

/**
 * A side of the board
 */
export type Side = 'white' | 'black';

/**
 * Signed piece code: positive for White, negative for Black, 0 for empty.
 *
 * 1 pawn, 2 rook, 3 knight, 4 bishop, 5 queen, 6 king.
 */
export type PieceCode = number;

/**
 * Absolute piece codes
 */
export const PIECE = {
  PAWN: 1,
  ROOK: 2,
  KNIGHT: 3,
  BISHOP: 4,
  QUEEN: 5,
  KING: 6,
} as const;

/**
 * Piece a pawn promotes to, in coordinate-move notation
 */
export type PromotionPiece = 'q' | 'r' | 'b' | 'n';

/**
 * A move in zero-based board coordinates.
 *
 * Rank index 0 is the eighth rank and file index 0 is the a-file,
 * so a8 is (0, 0) and h1 is (7, 7).
 */
export interface Move {
  readonly fromRank: number;
  readonly fromFile: number;
  readonly toRank: number;
  readonly toFile: number;
  /** Present only for pawn promotions */
  readonly promotion?: PromotionPiece;
}

/**
 * Board capability consumed by strategies, the turn loop and notation replay.
 *
 * Applying a move does not pass the turn: callers advance it explicitly,
 * so `currentMover()` changes only through `advanceTurn()` and `resetToInitial()`.
 */
export interface BoardCapability {
  /** Signed piece code at a square (0 = empty) */
  pieceAt(rank: number, file: number): PieceCode;
  /** Commit a move to the board */
  applyMove(move: Move): void;
  /** All legal moves for a side */
  legalMoves(side: Side): Move[];
  isInCheck(side: Side): boolean;
  isCheckmate(side: Side): boolean;
  /** Algebraic square label, e.g. (4, 4) -> "e4" */
  toCoordinateLabel(rank: number, file: number): string;
  /** Textual state used for stall detection; equal strings mean equal placement */
  snapshot(): string;
  resetToInitial(): void;
  advanceTurn(): void;
  currentMover(): Side;
  /** Independent copy for simulation scaffolding */
  clone(): BoardCapability;
}

/**
 * The other side
 */
export function oppositeSide(side: Side): Side {
  return side === 'white' ? 'black' : 'white';
}
