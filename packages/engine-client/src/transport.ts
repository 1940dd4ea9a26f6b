/**
 * Line-oriented transport to an engine process
 */

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { createInterface } from 'node:readline';

export type LineListener = (line: string) => void;
export type ExitListener = (code: number | null, error?: Error) => void;

/**
 * Two-way line channel to an engine
 *
 * `onLine` and `onExit` return a function that removes the listener.
 */
export interface EngineTransport {
  write(line: string): void;
  onLine(listener: LineListener): () => void;
  onExit(listener: ExitListener): () => void;
  close(): void;
}

export type TransportFactory = (path: string, args: readonly string[]) => EngineTransport;

/**
 * Spawn an engine executable and talk to it over stdin/stdout
 */
export const spawnEngineTransport: TransportFactory = (path, args) => {
  const events = new EventEmitter();
  let exited = false;

  const child = spawn(path, [...args], { stdio: ['pipe', 'pipe', 'ignore'] });
  const lines = createInterface({ input: child.stdout });

  const finish = (code: number | null, error?: Error): void => {
    if (exited) return;
    exited = true;
    lines.close();
    events.emit('exit', code, error);
  };

  lines.on('line', (line: string) => events.emit('line', line.trim()));
  child.on('exit', (code) => finish(code));
  child.on('error', (error) => finish(null, error));
  // EPIPE after the process died is reported through 'exit'
  child.stdin.on('error', (error) => finish(null, error));

  return {
    write(line: string): void {
      if (exited) {
        throw new Error(`Engine process '${path}' has exited`);
      }
      child.stdin.write(`${line}\n`);
    },
    onLine(listener: LineListener): () => void {
      events.on('line', listener);
      return () => events.off('line', listener);
    },
    onExit(listener: ExitListener): () => void {
      events.on('exit', listener);
      return () => events.off('exit', listener);
    },
    close(): void {
      if (exited) return;
      child.stdin.end();
      child.kill();
    },
  };
};
