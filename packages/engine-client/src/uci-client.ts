/**
 * UCI engine client
 */

import {
  EngineClientError,
  EngineClosedError,
  EngineProtocolError,
  EngineStartError,
  EngineTimeoutError,
} from './errors.js';
import { spawnEngineTransport, type EngineTransport, type TransportFactory } from './transport.js';

/**
 * Configuration for an engine process
 */
export interface EngineClientConfig {
  /** Executable to launch */
  path: string;
  /** Command-line arguments for the executable */
  args?: string[];
  /** Time allowed for each handshake reply (uciok, readyok) */
  handshakeTimeoutMs?: number;
  /** Sent as `setoption name <key> value <value>` after the handshake */
  options?: Record<string, string | number | boolean>;
}

/**
 * Default configuration for a locally installed Stockfish
 */
export const DEFAULT_ENGINE_CONFIG: Required<EngineClientConfig> = {
  path: 'stockfish',
  args: [],
  handshakeTimeoutMs: 10000,
  options: {},
};

const UCI_MOVE = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

/**
 * Client for an engine speaking the UCI line protocol
 *
 * The process is started lazily by `start()`, which is safe to call from
 * several owners; `quit()` is likewise idempotent.
 */
export class UciEngineClient {
  private transport: EngineTransport | null = null;
  private readonly config: Required<EngineClientConfig>;
  private startPromise: Promise<void> | null = null;
  private removeExitListener: (() => void) | null = null;
  private ready = false;
  private engineName: string | null = null;

  constructor(
    config: Partial<EngineClientConfig> = {},
    private readonly createTransport: TransportFactory = spawnEngineTransport,
  ) {
    this.config = {
      path: config.path ?? DEFAULT_ENGINE_CONFIG.path,
      args: config.args ?? DEFAULT_ENGINE_CONFIG.args,
      handshakeTimeoutMs: config.handshakeTimeoutMs ?? DEFAULT_ENGINE_CONFIG.handshakeTimeoutMs,
      options: config.options ?? DEFAULT_ENGINE_CONFIG.options,
    };
  }

  /**
   * Launch the engine and complete the `uci` / `isready` handshake
   *
   * @throws EngineTimeoutError if a handshake reply does not arrive in time
   * @throws EngineStartError if the process fails to launch or exits early
   */
  async start(): Promise<void> {
    if (this.ready) {
      return;
    }

    // Prevent multiple simultaneous handshakes
    if (this.startPromise) {
      return this.startPromise;
    }

    this.startPromise = this.handshake();

    try {
      await this.startPromise;
    } finally {
      this.startPromise = null;
    }
  }

  /**
   * Set the position as a sequence of coordinate moves from the start position
   */
  setPosition(moves: readonly string[]): void {
    this.send(moves.length > 0 ? `position startpos moves ${moves.join(' ')}` : 'position startpos');
  }

  /**
   * Search the current position for a fixed time and return the engine's choice
   *
   * @returns The move in coordinate notation, or null when the engine has none
   * @throws EngineProtocolError if the answer is not a coordinate move
   */
  async bestMove(moveTimeMs: number): Promise<string | null> {
    const reply = await this.request(
      `go movetime ${moveTimeMs}`,
      'go',
      (line) => line === 'bestmove' || line.startsWith('bestmove '),
    );

    const token = reply.split(/\s+/)[1];
    if (token === undefined || token === '(none)' || token === '0000') {
      return null;
    }
    if (!UCI_MOVE.test(token)) {
      throw new EngineProtocolError(reply, 'a coordinate move');
    }
    return token;
  }

  /**
   * Ask the engine to exit and release the process
   */
  quit(): void {
    const transport = this.transport;
    if (!transport) {
      return;
    }
    transport.write('quit');
    this.release(transport);
  }

  get isRunning(): boolean {
    return this.ready && this.transport !== null;
  }

  /**
   * Name reported by the engine during the handshake
   */
  get name(): string | null {
    return this.engineName;
  }

  get path(): string {
    return this.config.path;
  }

  private async handshake(): Promise<void> {
    const transport = this.createTransport(this.config.path, this.config.args);
    this.transport = transport;
    this.removeExitListener = transport.onExit(() => {
      this.transport = null;
      this.ready = false;
    });
    const removeIdListener = transport.onLine((line) => {
      if (line.startsWith('id name ')) {
        this.engineName = line.slice('id name '.length);
      }
    });

    const timeoutMs = this.config.handshakeTimeoutMs;
    try {
      await this.request('uci', 'uci', (line) => line === 'uciok', timeoutMs);
      for (const [name, value] of Object.entries(this.config.options)) {
        this.send(`setoption name ${name} value ${String(value)}`);
      }
      await this.request('isready', 'isready', (line) => line === 'readyok', timeoutMs);
      this.ready = true;
    } catch (err) {
      this.release(transport);
      if (err instanceof EngineTimeoutError) {
        throw err;
      }
      throw new EngineStartError(this.config.path, err instanceof Error ? err : undefined);
    } finally {
      removeIdListener();
    }
  }

  private release(transport: EngineTransport): void {
    this.removeExitListener?.();
    this.removeExitListener = null;
    this.transport = null;
    this.ready = false;
    transport.close();
  }

  private send(line: string): void {
    const transport = this.transport;
    if (!transport) {
      throw new EngineClosedError(line.split(' ')[0] ?? line);
    }
    try {
      transport.write(line);
    } catch (err) {
      if (err instanceof EngineClientError) {
        throw err;
      }
      throw new EngineClosedError(line, null, err instanceof Error ? err : undefined);
    }
  }

  /**
   * Send a line and resolve with the first reply matching `matches`.
   * Without a timeout the wait only ends on a match or when the process exits.
   */
  private request(
    line: string,
    operation: string,
    matches: (reply: string) => boolean,
    timeoutMs?: number,
  ): Promise<string> {
    const transport = this.transport;
    if (!transport) {
      return Promise.reject(new EngineClosedError(operation));
    }

    return new Promise<string>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const cleanup = (): void => {
        removeLineListener();
        removeExitListener();
        if (timer !== undefined) {
          clearTimeout(timer);
        }
      };

      const removeLineListener = transport.onLine((reply) => {
        if (!matches(reply)) return;
        cleanup();
        resolve(reply);
      });
      const removeExitListener = transport.onExit((code, error) => {
        cleanup();
        reject(new EngineClosedError(operation, code, error));
      });

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          cleanup();
          reject(new EngineTimeoutError(operation, timeoutMs));
        }, timeoutMs);
      }

      try {
        transport.write(line);
      } catch (err) {
        cleanup();
        reject(new EngineClosedError(operation, null, err instanceof Error ? err : undefined));
      }
    });
  }
}
