/**
 * Render surface that records refresh requests
 */

import { setTimeout as delay } from 'node:timers/promises';

import type { RenderSurface } from '@chessduel/types';

export interface RefreshCall {
  from: string | undefined;
  to: string | undefined;
}

export interface RecordingRenderSurfaceConfig {
  /** Simulated drawing time */
  latencyMs?: number;
  /** Reject the nth refresh (1-based) */
  failOn?: number;
}

export class RecordingRenderSurface implements RenderSurface {
  readonly refreshes: RefreshCall[] = [];

  constructor(private readonly config: RecordingRenderSurfaceConfig = {}) {}

  async refresh(highlightFrom?: string, highlightTo?: string): Promise<void> {
    this.refreshes.push({ from: highlightFrom, to: highlightTo });

    if (this.config.latencyMs) {
      await delay(this.config.latencyMs);
    }
    if (this.config.failOn === this.refreshes.length) {
      throw new Error(`Render failed on refresh ${this.refreshes.length}`);
    }
  }
}
