/**
 * Move strategy contract
 */

import type { BoardCapability, Move } from '@chessduel/types';

import type { ExternalEngineStrategy } from './external-engine.js';
import type { RandomPlayoutStrategy } from './random-playout.js';

export type StrategyKind = 'external-engine' | 'random-playout';

/**
 * What a strategy may know about the game besides the board
 */
export interface StrategyContext {
  /** Moves played so far, in coordinate notation */
  readonly history: readonly string[];
}

/**
 * Shape shared by every strategy
 */
export interface StrategyBase {
  readonly kind: StrategyKind;
  /** Label for logs and the terminal */
  readonly name: string;

  /**
   * Choose a move for the side to move, or null when it has none
   */
  proposeMove(board: BoardCapability, context: StrategyContext): Promise<Move | null>;

  /** Acquire resources before the first move of a game played on `board` */
  initialize(board: BoardCapability): Promise<void>;

  /** Release resources; runs after every game, however it ended */
  dispose(): Promise<void>;
}

/**
 * The strategies a side can be played by
 */
export type MoveStrategy = ExternalEngineStrategy | RandomPlayoutStrategy;
