/**
 * Strategy backed by an external UCI engine
 */

import type { BoardCapability, Move } from '@chessduel/types';
import { parseCoordinateMove } from '@chessduel/board';
import type { UciEngineClient } from '@chessduel/engine-client';

import type { StrategyBase, StrategyContext } from './types.js';

export const DEFAULT_MOVE_TIME_MS = 1000;

export interface ExternalEngineOptions {
  /** Thinking time per move (default: 1000) */
  moveTimeMs?: number;
}

/**
 * Asks the engine for its best move in the position reached by the history.
 *
 * Several strategies may share one client; starting and quitting are idempotent.
 */
export class ExternalEngineStrategy implements StrategyBase {
  readonly kind = 'external-engine' as const;
  readonly moveTimeMs: number;

  constructor(
    private readonly client: UciEngineClient,
    options: ExternalEngineOptions = {},
  ) {
    this.moveTimeMs = options.moveTimeMs ?? DEFAULT_MOVE_TIME_MS;
  }

  get name(): string {
    return this.client.name ?? this.client.path;
  }

  async initialize(_board: BoardCapability): Promise<void> {
    await this.client.start();
  }

  async proposeMove(_board: BoardCapability, context: StrategyContext): Promise<Move | null> {
    this.client.setPosition(context.history);
    const answer = await this.client.bestMove(this.moveTimeMs);
    return answer ? parseCoordinateMove(answer) : null;
  }

  async dispose(): Promise<void> {
    this.client.quit();
  }
}
