/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError, Option } from 'commander';

import type { CliOptions, StrategyChoice } from './config/schema.js';

export const VERSION = '0.1.0';

const STRATEGIES: readonly StrategyChoice[] = ['engine', 'random'];

/**
 * Strategy descriptions for help text
 */
const STRATEGY_HELP = `Strategies (--white, --black):
    engine - External UCI engine given by --engine [default for White]
    random - Random playouts, guided by Monte Carlo search
             when --simulations is above 0 [default for Black]`;

/**
 * Configuration sources for help text
 */
const CONFIG_HELP = `Configuration is read from .chessduelrc (JSON or YAML),
chessduel.config.js or the "chessduel" key of package.json, then
CHESSDUEL_* environment variables, then the options above.`;

/**
 * Commander argument parser for integer options
 */
function parseInteger(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('chessduel')
    .description('Automated chess matches between a UCI engine and random playouts')
    .version(VERSION);

  // Play command
  program
    .command('play', { isDefault: true })
    .description('Play games and save each one to a numbered notation file')
    .addOption(
      new Option('-w, --white <strategy>', 'Strategy playing White').choices([...STRATEGIES]),
    )
    .addOption(
      new Option('-b, --black <strategy>', 'Strategy playing Black').choices([...STRATEGIES]),
    )
    .option('-e, --engine <path>', 'UCI engine executable (default: stockfish)')
    .option('--move-time <ms>', 'Engine thinking time per move (default: 1000)', parseInteger)
    .option('-g, --games <n>', 'Number of games to play (default: 1)', parseInteger)
    .option('--pace <ms>', 'Pause between moves (default: 500)', parseInteger)
    .option('--max-plies <n>', 'Stop a game after this many plies (default: 500)', parseInteger)
    .option('--seed <n>', 'Seed for the random playout strategy', parseInteger)
    .option('--simulations <n>', 'Monte Carlo simulations per random move (default: 0)', parseInteger)
    .option('-o, --output-dir <dir>', 'Directory for game files (default: games)')
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-board', 'Do not print the board after each move')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--dry-run', 'Validate configuration and show where games would be saved')
    .option('--verbose', 'Print debug messages')
    .addHelpText('after', `\n${STRATEGY_HELP}\n\n${CONFIG_HELP}`)
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { playCommand } = await import('./commands/play.js');
      await playCommand(options);
    });

  return program;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function numberOption(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function strategyOption(value: unknown): StrategyChoice | undefined {
  return STRATEGIES.find((strategy) => strategy === value);
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  if (options['white'] !== undefined) result.white = strategyOption(options['white']);
  if (options['black'] !== undefined) result.black = strategyOption(options['black']);
  if (options['engine'] !== undefined) result.engine = stringOption(options['engine']);
  if (options['moveTime'] !== undefined) result.moveTime = numberOption(options['moveTime']);
  if (options['games'] !== undefined) result.games = numberOption(options['games']);
  if (options['pace'] !== undefined) result.pace = numberOption(options['pace']);
  if (options['maxPlies'] !== undefined) result.maxPlies = numberOption(options['maxPlies']);
  if (options['seed'] !== undefined) result.seed = numberOption(options['seed']);
  if (options['simulations'] !== undefined)
    result.simulations = numberOption(options['simulations']);
  if (options['outputDir'] !== undefined) result.outputDir = stringOption(options['outputDir']);
  if (options['config'] !== undefined) result.config = stringOption(options['config']);
  if (options['showConfig'] !== undefined)
    result.showConfig = booleanOption(options['showConfig']);
  // Note: Commander.js uses 'board' and 'color' (negated) for --no-board and --no-color
  if (options['board'] === false) result.noBoard = true;
  if (options['color'] === false) result.noColor = true;
  if (options['dryRun'] !== undefined) result.dryRun = booleanOption(options['dryRun']);
  if (options['verbose'] !== undefined) result.verbose = booleanOption(options['verbose']);

  return result;
}
