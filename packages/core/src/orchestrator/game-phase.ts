/**
 * Turn-loop phases and the transitions allowed between them
 */

import { InvalidStateTransitionError } from '../errors.js';

export type GamePhase =
  | 'idle'
  | 'initializing'
  | 'awaiting-move'
  | 'applying'
  | 'rendering'
  | 'checking-termination'
  | 'finalizing';

/**
 * Every running phase may go straight to finalizing: a game ends on
 * cancellation or a failure wherever the loop happens to be.
 */
export const PHASE_TRANSITIONS: Readonly<Record<GamePhase, readonly GamePhase[]>> = {
  idle: ['initializing'],
  initializing: ['awaiting-move', 'finalizing'],
  'awaiting-move': ['applying', 'finalizing'],
  applying: ['rendering', 'finalizing'],
  rendering: ['checking-termination', 'finalizing'],
  'checking-termination': ['awaiting-move', 'finalizing'],
  finalizing: ['idle'],
};

export function canTransition(from: GamePhase, to: GamePhase): boolean {
  return PHASE_TRANSITIONS[from].includes(to);
}

/**
 * Current phase of one orchestrator
 */
export class PhaseTracker {
  private current: GamePhase = 'idle';

  get phase(): GamePhase {
    return this.current;
  }

  /**
   * @throws InvalidStateTransitionError if the table does not allow the move
   */
  transition(to: GamePhase): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidStateTransitionError(this.current, to);
    }
    this.current = to;
  }

  /**
   * Return to idle after a game that could not finalize
   */
  reset(): void {
    this.current = 'idle';
  }
}
