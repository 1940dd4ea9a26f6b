/**
 * Default configuration values
 */

import {
  DEFAULT_EXPLORATION_CONSTANT,
  DEFAULT_GAMES_DIRECTORY,
  DEFAULT_MAX_PLAYOUT_PLIES,
  DEFAULT_MAX_PLIES,
  DEFAULT_MOVE_TIME_MS,
  DEFAULT_PACE_MS,
} from '@chessduel/core';
import { DEFAULT_ENGINE_CONFIG } from '@chessduel/engine-client';

import type {
  ChessDuelConfig,
  EngineConfigSchema,
  GameConfigSchema,
  OutputConfigSchema,
  SearchConfigSchema,
} from './schema.js';

/**
 * Default engine: `stockfish` on the PATH, one second per move
 */
export const DEFAULT_ENGINE_SETTINGS: EngineConfigSchema = {
  path: DEFAULT_ENGINE_CONFIG.path,
  args: [],
  moveTimeMs: DEFAULT_MOVE_TIME_MS,
  handshakeTimeoutMs: DEFAULT_ENGINE_CONFIG.handshakeTimeoutMs,
  options: {},
};

/**
 * Default match: the engine as White against random playouts, one game
 */
export const DEFAULT_GAME_CONFIG: GameConfigSchema = {
  white: 'engine',
  black: 'random',
  games: 1,
  paceMs: DEFAULT_PACE_MS,
  maxPlies: DEFAULT_MAX_PLIES,
};

export const DEFAULT_SEARCH_CONFIG: SearchConfigSchema = {
  simulations: 0,
  explorationConstant: DEFAULT_EXPLORATION_CONSTANT,
  maxPlayoutPlies: DEFAULT_MAX_PLAYOUT_PLIES,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  directory: DEFAULT_GAMES_DIRECTORY,
  showBoard: true,
  perspective: 'white',
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: ChessDuelConfig = {
  engine: DEFAULT_ENGINE_SETTINGS,
  game: DEFAULT_GAME_CONFIG,
  search: DEFAULT_SEARCH_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
