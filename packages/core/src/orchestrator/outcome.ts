/**
 * Turning a finished game into learning feedback
 */

import type { Side } from '@chessduel/types';

import type { GameEndEvent, GameEndListener } from './types.js';

export type GameOutcome = 'win' | 'loss' | 'draw';

/**
 * Result of the game from `side`'s point of view; anything but mate is a draw
 */
export function classifyOutcome(event: Pick<GameEndEvent, 'winner'>, side: Side): GameOutcome {
  if (event.winner === null) return 'draw';
  return event.winner === side ? 'win' : 'loss';
}

/**
 * Listener that feeds each game's result back into the random playout
 * strategies that played it: the outcome is recorded and every move the
 * strategy made is credited when it won. Games that ended in an error
 * or were cancelled are not counted.
 */
export function createOutcomeRecorder(): GameEndListener {
  return {
    onGameEnd(event: GameEndEvent): void {
      if (event.reason === 'error' || event.reason === 'cancelled') return;

      const sides: Side[] = ['white', 'black'];
      for (const side of sides) {
        const strategy = event.players[side];
        if (strategy.kind !== 'random-playout') continue;

        const outcome = classifyOutcome(event, side);
        strategy.recordOutcome(outcome);

        const parity = side === 'white' ? 0 : 1;
        event.history.forEach((move, ply) => {
          if (ply % 2 === parity) {
            strategy.updateMoveStatistics(move, outcome === 'win');
          }
        });
      }
    },
  };
}
