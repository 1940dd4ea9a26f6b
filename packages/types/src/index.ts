/**
 * @chessduel/types - Shared type definitions for chessduel
 *
 * Contracts that cross package boundaries: the coordinate move, the board
 * capability consumed by the orchestrator, and the surfaces it drives.
 *
 * Usage:
 *   import type { Move, BoardCapability } from '@chessduel/types';
 */

export type { Side, PieceCode, PromotionPiece, Move, BoardCapability } from './board/index.js';
export { PIECE, oppositeSide } from './board/index.js';

export type { RenderSurface, Logger } from './game/index.js';
