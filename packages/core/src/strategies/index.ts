export type { MoveStrategy, StrategyBase, StrategyContext, StrategyKind } from './types.js';
export {
  ExternalEngineStrategy,
  DEFAULT_MOVE_TIME_MS,
  type ExternalEngineOptions,
} from './external-engine.js';
export {
  RandomPlayoutStrategy,
  type RandomPlayoutOptions,
  type LearningStatistics,
} from './random-playout.js';
