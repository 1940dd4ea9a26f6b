export {
  GameOrchestrator,
  DEFAULT_PACE_MS,
  DEFAULT_MAX_PLIES,
  type OrchestratorOptions,
  type PlayOptions,
} from './game-orchestrator.js';
export { PhaseTracker, PHASE_TRANSITIONS, canTransition, type GamePhase } from './game-phase.js';
export { RenderSignal } from './render-signal.js';
export { MoveHistory } from './move-history.js';
export { classifyOutcome, createOutcomeRecorder, type GameOutcome } from './outcome.js';
export type {
  GameEndEvent,
  GameEndListener,
  GameResult,
  Players,
  TerminationReason,
  TurnObserver,
} from './types.js';
