/**
 * Render surface that prints the board to the terminal after every move
 */

import { renderBoard, type Perspective } from '@chessduel/board';
import type { BoardCapability, RenderSurface } from '@chessduel/types';

export interface TerminalRenderSurfaceOptions {
  /** Board orientation (default: 'white') */
  perspective?: Perspective;
  /** When false, refreshes complete without printing */
  enabled?: boolean;
}

export class TerminalRenderSurface implements RenderSurface {
  private readonly perspective: Perspective;
  private readonly enabled: boolean;

  constructor(
    private readonly board: BoardCapability,
    private readonly print: (text: string) => void,
    options: TerminalRenderSurfaceOptions = {},
  ) {
    this.perspective = options.perspective ?? 'white';
    this.enabled = options.enabled ?? true;
  }

  async refresh(highlightFrom?: string, highlightTo?: string): Promise<void> {
    if (!this.enabled) return;

    const highlight =
      highlightFrom !== undefined && highlightTo !== undefined
        ? { from: highlightFrom, to: highlightTo }
        : undefined;
    const options = highlight
      ? { perspective: this.perspective, highlight }
      : { perspective: this.perspective };
    this.print(renderBoard(this.board, options));
  }
}
