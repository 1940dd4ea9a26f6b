/**
 * Configuration schema types for the chessduel CLI
 */

import type { z } from 'zod';

import type {
  configSchema,
  engineConfigSchema,
  gameConfigSchema,
  outputConfigSchema,
  partialConfigSchema,
  perspectiveSchema,
  searchConfigSchema,
  strategyChoiceSchema,
} from './validation.js';

/**
 * Strategy playing a side: an external UCI engine or random playouts
 */
export type StrategyChoice = z.infer<typeof strategyChoiceSchema>;

export type BoardPerspective = z.infer<typeof perspectiveSchema>;

/**
 * Engine process: executable, per-move thinking time, UCI options
 */
export type EngineConfigSchema = z.infer<typeof engineConfigSchema>;

/**
 * Who plays, how many games, and how fast
 */
export type GameConfigSchema = z.infer<typeof gameConfigSchema>;

/**
 * Monte Carlo lookahead of the random playout strategy
 */
export type SearchConfigSchema = z.infer<typeof searchConfigSchema>;

export type OutputConfigSchema = z.infer<typeof outputConfigSchema>;

/**
 * Complete chessduel configuration
 */
export type ChessDuelConfig = z.infer<typeof configSchema>;

/**
 * Configuration as read from a file, any section or field may be missing
 */
export type PartialChessDuelConfig = z.infer<typeof partialConfigSchema>;

/**
 * Options of the `play` command after parsing
 */
export interface CliOptions {
  white?: StrategyChoice | undefined;
  black?: StrategyChoice | undefined;
  engine?: string | undefined;
  moveTime?: number | undefined;
  games?: number | undefined;
  pace?: number | undefined;
  maxPlies?: number | undefined;
  seed?: number | undefined;
  simulations?: number | undefined;
  outputDir?: string | undefined;
  config?: string | undefined;
  showConfig?: boolean | undefined;
  noBoard?: boolean | undefined;
  noColor?: boolean | undefined;
  dryRun?: boolean | undefined;
  verbose?: boolean | undefined;
}
