/**
 * Single-slot rendezvous between the turn loop and the render surface
 */

import type { RenderSurface } from '@chessduel/types';

import { RenderInFlightError } from '../errors.js';

export class RenderSignal {
  private pending: Promise<void> | null = null;

  constructor(private readonly surface: RenderSurface) {}

  get inFlight(): boolean {
    return this.pending !== null;
  }

  /**
   * Ask the surface to redraw and resolve once it has
   *
   * @throws RenderInFlightError if the previous request has not completed
   */
  request(highlightFrom?: string, highlightTo?: string): Promise<void> {
    if (this.pending) {
      throw new RenderInFlightError();
    }
    const pending = this.surface.refresh(highlightFrom, highlightTo).finally(() => {
      this.pending = null;
    });
    this.pending = pending;
    return pending;
  }
}
