/**
 * Shared types for the game reporter
 */

import type { GameResult } from '@chessduel/core';

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

export interface GameReporterOptions {
  /** Print nothing */
  silent?: boolean;
  /** Colorize output (default: true) */
  color?: boolean;
  /** Also print debug messages */
  verbose?: boolean;
  /** Show a spinner while a side is thinking (default: true) */
  spinner?: boolean;
}

/**
 * Termination reason display names
 */
export const REASON_NAMES: Record<GameResult['reason'], string> = {
  'no-move': 'no move available',
  stalled: 'position unchanged',
  checkmate: 'checkmate',
  'max-plies': 'move limit reached',
  cancelled: 'cancelled',
};
