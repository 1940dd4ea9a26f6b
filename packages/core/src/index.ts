/**
 * @chessduel/core - Game orchestration for chessduel
 *
 * This package contains:
 * - The game tree and its Monte Carlo search
 * - Move strategies (external engine, random playout)
 * - The turn loop and its end-of-game handling
 * - Notation reconstruction and game file persistence
 */

export const VERSION = '0.1.0';

export * from './tree/index.js';
export * from './search/index.js';
export * from './strategies/index.js';
export * from './orchestrator/index.js';
export * from './notation/index.js';

export {
  createSeededRandom,
  createProcessRandom,
  randomIndex,
  type RandomSource,
} from './random/mulberry32.js';

export {
  UnreachableMoveError,
  DuplicateChildError,
  InvalidStateTransitionError,
  RenderInFlightError,
  GameSaveError,
} from './errors.js';
