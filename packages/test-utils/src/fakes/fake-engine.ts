/**
 * In-process stand-in for a UCI engine executable
 *
 * Answers the handshake, records every line it receives and replies to
 * `go` with scripted best moves, then `bestmove (none)` once they run out.
 */

import type {
  EngineTransport,
  ExitListener,
  LineListener,
  TransportFactory,
} from '@chessduel/engine-client';

export interface FakeEngineConfig {
  /** Reported as `id name` during the handshake */
  name?: string;
  /** Replies to successive `go` commands */
  bestMoves?: string[];
  /** Never answer `uci` or `isready` */
  silent?: boolean;
  /** Exit with this code instead of answering the nth `go` (1-based) */
  crashOnGo?: { call: number; exitCode: number };
}

/**
 * One launched process of a fake engine
 */
export class FakeEngineTransport implements EngineTransport {
  readonly sent: string[] = [];
  private readonly lineListeners = new Set<LineListener>();
  private readonly exitListeners = new Set<ExitListener>();
  private exited = false;

  constructor(private readonly respond: (line: string, transport: FakeEngineTransport) => void) {}

  get closed(): boolean {
    return this.exited;
  }

  write(line: string): void {
    if (this.exited) {
      throw new Error('Fake engine has exited');
    }
    this.sent.push(line);
    // Reply asynchronously, as a real process would
    queueMicrotask(() => {
      if (!this.exited) {
        this.respond(line, this);
      }
    });
  }

  onLine(listener: LineListener): () => void {
    this.lineListeners.add(listener);
    return () => this.lineListeners.delete(listener);
  }

  onExit(listener: ExitListener): () => void {
    this.exitListeners.add(listener);
    return () => this.exitListeners.delete(listener);
  }

  close(): void {
    this.exit(0);
  }

  /**
   * Deliver a line as if the engine printed it
   */
  emit(line: string): void {
    for (const listener of [...this.lineListeners]) {
      listener(line);
    }
  }

  /**
   * Terminate the fake process
   */
  exit(code: number | null, error?: Error): void {
    if (this.exited) return;
    this.exited = true;
    for (const listener of [...this.exitListeners]) {
      listener(code, error);
    }
  }
}

/**
 * A fake engine executable: each launch through `factory` yields a new transport
 */
export class FakeEngine {
  readonly transports: FakeEngineTransport[] = [];
  private readonly bestMoves: string[];
  private goCalls = 0;

  constructor(private readonly config: FakeEngineConfig = {}) {
    this.bestMoves = [...(config.bestMoves ?? [])];
  }

  readonly factory: TransportFactory = () => {
    const transport = new FakeEngineTransport((line, target) => this.reply(line, target));
    this.transports.push(transport);
    return transport;
  };

  /**
   * Every line sent to any launch, in order
   */
  get sent(): string[] {
    return this.transports.flatMap((transport) => transport.sent);
  }

  get launches(): number {
    return this.transports.length;
  }

  /**
   * Queue more replies for `go`
   */
  enqueue(...moves: string[]): void {
    this.bestMoves.push(...moves);
  }

  private reply(line: string, transport: FakeEngineTransport): void {
    const command = line.split(' ')[0];

    switch (command) {
      case 'uci':
        if (this.config.silent) return;
        transport.emit(`id name ${this.config.name ?? 'Fake Engine'}`);
        transport.emit('uciok');
        return;
      case 'isready':
        if (this.config.silent) return;
        transport.emit('readyok');
        return;
      case 'go': {
        this.goCalls++;
        const crash = this.config.crashOnGo;
        if (crash && crash.call === this.goCalls) {
          transport.exit(crash.exitCode);
          return;
        }
        transport.emit('info depth 1 score cp 0');
        transport.emit(`bestmove ${this.bestMoves.shift() ?? '(none)'}`);
        return;
      }
      case 'quit':
        transport.exit(0);
        return;
      default:
        return;
    }
  }
}

/**
 * Create a fake engine
 */
export function createFakeEngine(config: FakeEngineConfig = {}): FakeEngine {
  return new FakeEngine(config);
}
