/**
 * Configuration module exports
 */

// Schema types
export type {
  StrategyChoice,
  BoardPerspective,
  EngineConfigSchema,
  GameConfigSchema,
  SearchConfigSchema,
  OutputConfigSchema,
  ChessDuelConfig,
  PartialChessDuelConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_ENGINE_SETTINGS,
  DEFAULT_GAME_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  strategyChoiceSchema,
  perspectiveSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, loadConfigFile, mapCliToConfig, formatConfig } from './loader.js';
