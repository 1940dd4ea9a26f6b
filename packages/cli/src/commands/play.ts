/**
 * Play command implementation
 */

import chalk from 'chalk';

import { ChessBoard } from '@chessduel/board';
import {
  ExternalEngineStrategy,
  GameOrchestrator,
  GameSaveError,
  GameSaver,
  RandomPlayoutStrategy,
  createOutcomeRecorder,
  type GameResult,
  type MoveStrategy,
  type Players,
  type PlayOptions,
  type RandomPlayoutOptions,
} from '@chessduel/core';
import {
  EngineStartError,
  EngineTimeoutError,
  UciEngineClient,
  type TransportFactory,
} from '@chessduel/engine-client';

import { parseCliOptions, VERSION } from '../cli.js';
import {
  formatConfig,
  loadConfig,
  type ChessDuelConfig,
  type StrategyChoice,
} from '../config/index.js';
import { EngineUnavailableError, OutputError, resolveAbsolutePath } from '../errors/index.js';
import { GameReporter } from '../progress/index.js';
import { TerminalRenderSurface } from '../render/terminal-surface.js';

export interface MatchDependencies {
  reporter: GameReporter;
  /** Launches the engine process (default: spawn the configured executable) */
  createTransport?: TransportFactory;
  /** Aborting ends the running game, which is still saved, and skips the rest */
  signal?: AbortSignal;
}

export interface MatchOutcome {
  results: GameResult[];
  players: Players;
}

/**
 * Build the strategies for both sides
 *
 * Engine sides share one engine process; seeded random sides get
 * consecutive seeds so they do not mirror each other.
 */
export function createPlayers(
  config: ChessDuelConfig,
  reporter: GameReporter,
  createTransport?: TransportFactory,
): Players {
  let client: UciEngineClient | null = null;
  const engineClient = (): UciEngineClient => {
    if (!client) {
      client = new UciEngineClient(
        {
          path: config.engine.path,
          args: config.engine.args,
          handshakeTimeoutMs: config.engine.handshakeTimeoutMs,
          options: config.engine.options,
        },
        createTransport,
      );
    }
    return client;
  };

  const build = (choice: StrategyChoice, seedOffset: number): MoveStrategy => {
    if (choice === 'engine') {
      return new ExternalEngineStrategy(engineClient(), { moveTimeMs: config.engine.moveTimeMs });
    }

    const options: RandomPlayoutOptions = {
      simulations: config.search.simulations,
      explorationConstant: config.search.explorationConstant,
      maxPlayoutPlies: config.search.maxPlayoutPlies,
      logger: reporter,
    };
    if (config.game.seed !== undefined) {
      options.seed = config.game.seed + seedOffset;
    }
    return new RandomPlayoutStrategy(options);
  };

  return { white: build(config.game.white, 0), black: build(config.game.black, 1) };
}

/**
 * Translate library failures into CLI errors with suggestions
 */
function toCliError(error: unknown, config: ChessDuelConfig): unknown {
  if (error instanceof EngineStartError || error instanceof EngineTimeoutError) {
    return new EngineUnavailableError(config.engine.path, error);
  }
  if (error instanceof GameSaveError) {
    return new OutputError(
      error.message,
      `Check that ${resolveAbsolutePath(config.output.directory)} is writable, or choose another --output-dir`,
    );
  }
  return error;
}

/**
 * Play the configured number of games
 */
export async function runMatch(
  config: ChessDuelConfig,
  deps: MatchDependencies,
): Promise<MatchOutcome> {
  const { reporter, signal } = deps;
  const players = createPlayers(config, reporter, deps.createTransport);
  const board = new ChessBoard();

  const orchestrator = new GameOrchestrator({
    white: players.white,
    black: players.black,
    board,
    renderSurface: new TerminalRenderSurface(board, (text) => reporter.printBoard(text), {
      perspective: config.output.perspective,
      enabled: config.output.showBoard,
    }),
    saver: new GameSaver({ directory: config.output.directory }),
    logger: reporter,
    observer: reporter,
    paceMs: config.game.paceMs,
    maxPlies: config.game.maxPlies,
  });
  orchestrator.addGameEndListener(createOutcomeRecorder());

  const playOptions: PlayOptions = signal ? { signal } : {};
  const results: GameResult[] = [];

  for (let index = 0; index < config.game.games; index++) {
    if (signal?.aborted) break;

    reporter.startGame(index, config.game.games, players.white.name, players.black.name);
    let result: GameResult;
    try {
      result = await orchestrator.playGame(playOptions);
    } catch (error) {
      throw toCliError(error, config);
    }
    reporter.gameFinished(result);
    results.push(result);
  }

  return { results, players };
}

/**
 * Show what a match would do without starting any strategy
 */
async function dryRun(config: ChessDuelConfig, reporter: GameReporter): Promise<void> {
  const saver = new GameSaver({ directory: config.output.directory });

  reporter.printMessage('Dry-run mode: validating setup...');
  reporter.printMessage('');
  reporter.printSuccess('Configuration is valid');
  reporter.printMessage(`  White: ${config.game.white}`);
  reporter.printMessage(`  Black: ${config.game.black}`);
  if (config.game.white === 'engine' || config.game.black === 'engine') {
    reporter.printMessage(
      `  Engine: ${config.engine.path} (${config.engine.moveTimeMs}ms per move)`,
    );
  }
  reporter.printMessage(`  Games: ${config.game.games}`);
  const nextPath = resolveAbsolutePath(await saver.nextFilePath());
  reporter.printSuccess(`First game would be saved to ${nextPath}`);
  reporter.printMessage('');
  reporter.printMessage('Dry-run complete. No game was played.');
}

/**
 * Main play command handler
 */
export async function playCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  if (options.noColor) {
    chalk.level = 0;
  }
  const reporter = new GameReporter({
    color: !options.noColor,
    verbose: options.verbose ?? false,
  });

  const config = await loadConfig(options);

  // Show config and exit if requested
  if (options.showConfig) {
    console.log(formatConfig(config));
    return;
  }

  reporter.printHeader(VERSION);

  if (options.dryRun) {
    await dryRun(config, reporter);
    return;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    reporter.warn('Interrupted, saving the current game');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const { results } = await runMatch(config, { reporter, signal: controller.signal });
    reporter.printSummary(results);
  } finally {
    process.off('SIGINT', onInterrupt);
    reporter.stop();
  }
}
