/**
 * Surfaces driven by the turn loop
 */

/**
 * Display that redraws the shared board.
 *
 * The turn loop awaits each refresh before it reads the board again.
 */
export interface RenderSurface {
  /**
   * Redraw the board, highlighting the squares of the last move
   * (both undefined before the first move)
   */
  refresh(highlightFrom?: string, highlightTo?: string): Promise<void>;
}

/**
 * Minimal logger used by library packages for operational messages
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}
