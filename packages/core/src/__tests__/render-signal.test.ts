import { describe, it, expect } from 'vitest';

import type { RenderSurface } from '@chessduel/types';

import { RenderInFlightError } from '../errors.js';
import { RenderSignal } from '../orchestrator/render-signal.js';

/**
 * Surface whose refreshes complete only when the test says so
 */
function createManualSurface(): { surface: RenderSurface; complete: () => void; calls: string[] } {
  const calls: string[] = [];
  const pending: Array<() => void> = [];
  return {
    calls,
    surface: {
      refresh(from?: string, to?: string): Promise<void> {
        calls.push(`${from ?? '-'}${to ?? '-'}`);
        return new Promise<void>((resolve) => pending.push(resolve));
      },
    },
    complete: () => pending.shift()?.(),
  };
}

describe('RenderSignal', () => {
  it('passes the highlighted squares to the surface', async () => {
    const { surface, complete, calls } = createManualSurface();
    const signal = new RenderSignal(surface);

    const done = signal.request('e2', 'e4');
    complete();
    await done;

    expect(calls).toEqual(['e2e4']);
  });

  it('refuses a second request while one is outstanding', async () => {
    const { surface, complete } = createManualSurface();
    const signal = new RenderSignal(surface);

    const first = signal.request();
    expect(signal.inFlight).toBe(true);
    expect(() => signal.request()).toThrow(RenderInFlightError);

    complete();
    await first;

    expect(signal.inFlight).toBe(false);
    const second = signal.request('g1', 'f3');
    complete();
    await expect(second).resolves.toBeUndefined();
  });

  it('frees the slot when the surface fails', async () => {
    const signal = new RenderSignal({
      refresh: () => Promise.reject(new Error('display gone')),
    });

    await expect(signal.request()).rejects.toThrow('display gone');
    expect(signal.inFlight).toBe(false);
  });
});
