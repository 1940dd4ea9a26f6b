/**
 * Loggers for tests
 */

import { vi } from 'vitest';

import type { Logger } from '@chessduel/types';

export type LogLevel = 'debug' | 'info' | 'warn';

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export interface TrackingLogger extends Logger {
  readonly entries: LogEntry[];
  messages(level: LogLevel): string[];
}

/**
 * Logger that discards everything
 */
export function createNullLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  };
}

/**
 * Logger that keeps every message for inspection
 */
export function createTrackingLogger(): TrackingLogger {
  const entries: LogEntry[] = [];

  const track =
    (level: LogLevel): ((message: string) => void) =>
    (message: string): void => {
      entries.push({ level, message });
    };

  return {
    entries,
    debug: vi.fn(track('debug')),
    info: vi.fn(track('info')),
    warn: vi.fn(track('warn')),
    messages: (level: LogLevel): string[] =>
      entries.filter((entry) => entry.level === level).map((entry) => entry.message),
  };
}
