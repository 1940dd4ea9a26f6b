export {
  uctScore,
  selectChild,
  DEFAULT_EXPLORATION_CONSTANT,
} from './uct-selector.js';

export {
  MonteCarloSimulator,
  DEFAULT_MAX_PLAYOUT_PLIES,
  type SimulatorOptions,
  type PlayoutResult,
} from './monte-carlo-simulator.js';
