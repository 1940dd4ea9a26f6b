/**
 * Turn loop events and results
 */

import type { BoardCapability, Side } from '@chessduel/types';

import type { MoveStrategy } from '../strategies/types.js';

export type TerminationReason =
  | 'no-move'
  | 'stalled'
  | 'checkmate'
  | 'max-plies'
  | 'cancelled'
  | 'error';

export interface Players {
  readonly white: MoveStrategy;
  readonly black: MoveStrategy;
}

/**
 * Delivered to game end listeners before the game is saved
 */
export interface GameEndEvent {
  readonly reason: TerminationReason;
  /** Side that delivered mate, null otherwise */
  readonly winner: Side | null;
  readonly history: readonly string[];
  /** The board in its final position */
  readonly board: BoardCapability;
  readonly players: Players;
}

export interface GameEndListener {
  onGameEnd(event: GameEndEvent): void | Promise<void>;
}

/**
 * Optional hooks into the turn loop, for progress display
 */
export interface TurnObserver {
  turnStarted?(side: Side, strategy: MoveStrategy): void;
  moveApplied?(side: Side, move: string, ply: number): void;
}

export interface GameResult {
  readonly reason: Exclude<TerminationReason, 'error'>;
  readonly winner: Side | null;
  readonly history: readonly string[];
  readonly notation: string;
  /** Undefined when no move was played and nothing was written */
  readonly savedPath: string | undefined;
}
