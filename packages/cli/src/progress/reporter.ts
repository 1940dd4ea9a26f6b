/**
 * Game reporter with ora spinners
 *
 * Doubles as the orchestrator's logger and turn observer, so everything
 * printed during a match goes through one place.
 */

import chalk from 'chalk';
import ora, { type Color, type Ora } from 'ora';

import type { GameResult, MoveStrategy } from '@chessduel/core';
import type { Logger, Side } from '@chessduel/types';

import { REASON_NAMES, type ColorFunctions, type GameReporterOptions } from './types.js';

export type { GameReporterOptions } from './types.js';

// Helper function for colorized output
function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

/**
 * Score of a finished game: 1-0, 0-1, 1/2-1/2, or * when it was interrupted
 */
export function formatScore(result: Pick<GameResult, 'reason' | 'winner'>): string {
  if (result.winner === 'white') return '1-0';
  if (result.winner === 'black') return '0-1';
  return result.reason === 'cancelled' ? '*' : '1/2-1/2';
}

/**
 * Move as listed during play: `12. e2e4` for White, `12... e7e5` for Black
 */
export function formatMoveLine(side: Side, move: string, ply: number): string {
  const moveNumber = Math.ceil(ply / 2);
  return side === 'white' ? `${moveNumber}. ${move}` : `${moveNumber}... ${move}`;
}

function capitalize(side: Side): string {
  return side === 'white' ? 'White' : 'Black';
}

/**
 * Console reporter for a match
 */
export class GameReporter implements Logger {
  private spinner: Ora | null = null;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly useSpinner: boolean;
  private readonly c: ColorFunctions;

  constructor(options: GameReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.useSpinner = options.spinner ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`chessduel v${version}`));
    console.log('');
  }

  /**
   * Announce a game of the match
   */
  startGame(gameIndex: number, totalGames: number, white: string, black: string): void {
    if (this.silent) return;
    const gameLabel = totalGames > 1 ? `Game ${gameIndex + 1}/${totalGames}` : 'Game';
    console.log(this.c.bold(`${gameLabel}: ${white} (White) vs ${black} (Black)`));
  }

  turnStarted(side: Side, strategy: MoveStrategy): void {
    if (this.silent || !this.useSpinner) return;

    this.stopSpinner();
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: `${capitalize(side)} (${strategy.name}) is thinking`,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }
    this.spinner = ora(oraOptions).start();
  }

  moveApplied(side: Side, move: string, ply: number): void {
    this.stopSpinner();
    if (this.silent) return;
    console.log(`  ${this.c.cyan(formatMoveLine(side, move, ply))}`);
  }

  /**
   * Print a rendered board
   */
  printBoard(board: string): void {
    if (this.silent) return;
    console.log('');
    console.log(board);
    console.log('');
  }

  /**
   * Report how a game ended and where it was written
   */
  gameFinished(result: GameResult): void {
    this.stopSpinner();
    if (this.silent) return;

    const score = formatScore(result);
    const colorScore = result.winner === null ? this.c.yellow(score) : this.c.green(score);
    console.log(
      `${this.c.bold('Result:')} ${colorScore} ${this.c.dim(`(${REASON_NAMES[result.reason]}, ${result.history.length} plies)`)}`,
    );
    if (result.savedPath !== undefined) {
      console.log(this.c.dim(`Saved to ${result.savedPath}`));
    }
    console.log('');
  }

  /**
   * Print the score table of a match
   */
  printSummary(results: readonly GameResult[]): void {
    if (this.silent || results.length === 0) return;

    const whiteWins = results.filter((r) => r.winner === 'white').length;
    const blackWins = results.filter((r) => r.winner === 'black').length;
    const unfinished = results.filter((r) => r.reason === 'cancelled').length;
    const draws = results.length - whiteWins - blackWins - unfinished;

    console.log(this.c.bold('Match summary'));
    console.log(`  Games:      ${results.length}`);
    console.log(`  White wins: ${whiteWins}`);
    console.log(`  Black wins: ${blackWins}`);
    console.log(`  Draws:      ${draws}`);
    if (unfinished > 0) {
      console.log(`  Cancelled:  ${unfinished}`);
    }
  }

  /**
   * Print a plain message
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    this.stopSpinner();
  }

  debug(message: string): void {
    if (this.silent || !this.verbose) return;
    this.interrupt(() => console.log(this.c.dim(message)));
  }

  info(message: string): void {
    if (this.silent) return;
    this.interrupt(() => console.log(this.c.dim(message)));
  }

  /**
   * Display a warning message
   */
  warn(message: string): void {
    if (this.silent) return;
    this.interrupt(() => console.log(this.c.yellow(`⚠ ${message}`)));
  }

  /**
   * Print without tearing a running spinner
   */
  private interrupt(print: () => void): void {
    const spinner = this.spinner;
    if (spinner?.isSpinning) {
      spinner.clear();
      print();
      spinner.render();
    } else {
      print();
    }
  }

  private stopSpinner(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
