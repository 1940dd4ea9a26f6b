/**
 * @chessduel/board - Board capability backed by chess.js
 *
 * This package handles:
 * - The ChessBoard adapter implementing BoardCapability
 * - Coordinate move encoding and decoding ("e2e4" <-> Move)
 * - ASCII board rendering for terminal display
 */

export const VERSION = '0.1.0';

export { ChessBoard, STARTING_FEN } from './chess/board.js';

export { renderBoard, pieceSymbol } from './chess/board-visualizer.js';
export type { Perspective, BoardRenderOptions } from './chess/board-visualizer.js';

export {
  createMove,
  movesEqual,
  parseCoordinateMove,
  formatCoordinateMove,
  parseSquare,
  squareLabel,
  isOnBoard,
  toPromotionPiece,
} from './moves/coordinate-move.js';

export {
  InvalidFenError,
  IllegalMoveError,
  InvalidSquareError,
  InvalidMoveNotationError,
} from './errors.js';
