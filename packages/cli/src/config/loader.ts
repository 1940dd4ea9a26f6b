/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { ChessDuelConfig, CliOptions } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

/**
 * One source of configuration values, before validation
 */
type ConfigLayer = Record<string, unknown>;

type EnvValueKind = 'string' | 'number' | 'boolean';

/**
 * Environment variable mapping
 * Maps env var names to config paths and the type of value they carry
 */
const ENV_VAR_MAP: Record<string, { path: string; kind: EnvValueKind }> = {
  // Engine
  CHESSDUEL_ENGINE_PATH: { path: 'engine.path', kind: 'string' },
  CHESSDUEL_MOVE_TIME: { path: 'engine.moveTimeMs', kind: 'number' },
  CHESSDUEL_HANDSHAKE_TIMEOUT: { path: 'engine.handshakeTimeoutMs', kind: 'number' },

  // Game
  CHESSDUEL_WHITE: { path: 'game.white', kind: 'string' },
  CHESSDUEL_BLACK: { path: 'game.black', kind: 'string' },
  CHESSDUEL_GAMES: { path: 'game.games', kind: 'number' },
  CHESSDUEL_PACE: { path: 'game.paceMs', kind: 'number' },
  CHESSDUEL_MAX_PLIES: { path: 'game.maxPlies', kind: 'number' },
  CHESSDUEL_SEED: { path: 'game.seed', kind: 'number' },

  // Search
  CHESSDUEL_SIMULATIONS: { path: 'search.simulations', kind: 'number' },
  CHESSDUEL_EXPLORATION: { path: 'search.explorationConstant', kind: 'number' },

  // Output
  CHESSDUEL_OUTPUT_DIR: { path: 'output.directory', kind: 'string' },
  CHESSDUEL_SHOW_BOARD: { path: 'output.showBoard', kind: 'boolean' },
  CHESSDUEL_PERSPECTIVE: { path: 'output.perspective', kind: 'string' },
};

const SEARCH_PLACES = [
  'package.json',
  '.chessduelrc',
  '.chessduelrc.json',
  '.chessduelrc.yaml',
  '.chessduelrc.yml',
  '.chessduelrc.js',
  '.chessduelrc.cjs',
  'chessduel.config.js',
  'chessduel.config.cjs',
];

function isRecord(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two configuration layers
 * Source values override target values; undefined source values are ignored
 */
export function deepMerge(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }

  return result;
}

/**
 * Set a nested property on an object using dot notation path
 */
function setNestedProperty(obj: ConfigLayer, path: string, value: unknown): void {
  const parts = path.split('.');
  const lastPart = parts.pop();
  if (lastPart === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigLayer = {};
      current[part] = created;
      current = created;
    }
  }

  current[lastPart] = value;
}

/**
 * Parse environment variable value based on expected type
 *
 * Unparseable numbers are passed through so validation reports them.
 */
function parseEnvValue(value: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case 'boolean':
      return value.toLowerCase() === 'true' || value === '1';
    case 'number': {
      const num = Number(value);
      return Number.isNaN(num) ? value : num;
    }
    case 'string':
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const config: ConfigLayer = {};

  for (const [envVar, { path, kind }] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      setNestedProperty(config, path, parseEnvValue(value, kind));
    }
  }

  return config;
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * Without an explicit path the usual places are searched and a missing
 * file is not an error.
 * @throws ConfigError if an explicit config file cannot be read
 * @throws ConfigValidationError if the file's contents are invalid
 */
export async function loadConfigFile(configPath?: string): Promise<ConfigLayer> {
  const explorer = cosmiconfig('chessduel', { searchPlaces: SEARCH_PLACES });

  let result: CosmiconfigResult;
  if (configPath) {
    try {
      result = await explorer.load(configPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(
        `Cannot read config file ${resolveAbsolutePath(configPath)}: ${reason}`,
        'Check the path given to --config',
      );
    }
  } else {
    result = await explorer.search();
  }

  if (!result || result.isEmpty) {
    return {};
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to a config layer
 */
export function mapCliToConfig(options: CliOptions): ConfigLayer {
  const config: ConfigLayer = {};
  const set = (path: string, value: unknown): void => {
    if (value !== undefined) {
      setNestedProperty(config, path, value);
    }
  };

  set('engine.path', options.engine);
  set('engine.moveTimeMs', options.moveTime);

  set('game.white', options.white);
  set('game.black', options.black);
  set('game.games', options.games);
  set('game.paceMs', options.pace);
  set('game.maxPlies', options.maxPlies);
  set('game.seed', options.seed);

  set('search.simulations', options.simulations);

  set('output.directory', options.outputDir);
  if (options.noBoard) {
    set('output.showBoard', false);
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 * Priority: CLI args > env vars > config file > defaults
 * @throws ConfigValidationError if the merged configuration is invalid
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ChessDuelConfig> {
  let config: ConfigLayer = deepMerge({}, DEFAULT_CONFIG);
  config = deepMerge(config, await loadConfigFile(cliOptions.config));
  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: ChessDuelConfig): string {
  return JSON.stringify(config, null, 2);
}
