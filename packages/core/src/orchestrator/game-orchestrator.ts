/**
 * Game Orchestrator
 *
 * Runs one game at a time: asks the side to move for a move, commits it,
 * waits for the render surface, checks for the end of the game, and on
 * the way out notifies listeners, writes the notation and releases the
 * strategies.
 */

import { setTimeout as delay } from 'node:timers/promises';

import type { BoardCapability, Logger, RenderSurface, Side } from '@chessduel/types';
import { oppositeSide } from '@chessduel/types';
import { formatCoordinateMove } from '@chessduel/board';

import { GameSaver } from '../notation/game-saver.js';
import { NotationReconstructor } from '../notation/reconstructor.js';
import type { MoveStrategy } from '../strategies/types.js';

import { PhaseTracker, type GamePhase } from './game-phase.js';
import { MoveHistory } from './move-history.js';
import { RenderSignal } from './render-signal.js';
import type {
  GameEndEvent,
  GameEndListener,
  GameResult,
  Players,
  TerminationReason,
  TurnObserver,
} from './types.js';

export const DEFAULT_PACE_MS = 500;
export const DEFAULT_MAX_PLIES = 500;

export interface OrchestratorOptions {
  white: MoveStrategy;
  black: MoveStrategy;
  board: BoardCapability;
  renderSurface: RenderSurface;
  /** Where finished games are written (default: ./games) */
  saver?: GameSaver;
  logger?: Logger;
  observer?: TurnObserver;
  /** Pause between turns (default: 500) */
  paceMs?: number;
  /** Plies after which the game is stopped (default: 500) */
  maxPlies?: number;
}

export interface PlayOptions {
  /** Aborting ends the game at the next turn boundary; it is still saved */
  signal?: AbortSignal;
}

interface Termination<R extends TerminationReason = TerminationReason> {
  reason: R;
  winner: Side | null;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function linkSignal(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) return () => undefined;
  if (source.aborted) {
    target.abort();
    return () => undefined;
  }
  const onAbort = (): void => target.abort();
  source.addEventListener('abort', onAbort, { once: true });
  return () => source.removeEventListener('abort', onAbort);
}

export class GameOrchestrator {
  private readonly players: Players;
  private readonly board: BoardCapability;
  private readonly renderSignal: RenderSignal;
  private readonly saver: GameSaver;
  private readonly logger: Logger;
  private readonly observer: TurnObserver;
  private readonly reconstructor: NotationReconstructor;
  private readonly paceMs: number;
  private readonly maxPlies: number;

  private readonly phaseTracker = new PhaseTracker();
  private readonly history = new MoveHistory();
  private readonly listeners: GameEndListener[] = [];
  private controller: AbortController | null = null;

  constructor(options: OrchestratorOptions) {
    this.players = { white: options.white, black: options.black };
    this.board = options.board;
    this.renderSignal = new RenderSignal(options.renderSurface);
    this.saver = options.saver ?? new GameSaver();
    this.logger = options.logger ?? console;
    this.observer = options.observer ?? {};
    this.reconstructor = new NotationReconstructor(this.logger);
    this.paceMs = options.paceMs ?? DEFAULT_PACE_MS;
    this.maxPlies = options.maxPlies ?? DEFAULT_MAX_PLIES;
  }

  get phase(): GamePhase {
    return this.phaseTracker.phase;
  }

  /**
   * Moves of the game in progress (or the last one played)
   */
  get moves(): readonly string[] {
    return this.history.view;
  }

  addGameEndListener(listener: GameEndListener): void {
    this.listeners.push(listener);
  }

  removeGameEndListener(listener: GameEndListener): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) {
      this.listeners.splice(index, 1);
    }
  }

  /**
   * End the running game at the next turn boundary
   */
  stop(): void {
    this.controller?.abort();
  }

  /**
   * Play one game to its end
   *
   * Strategy and render failures propagate once the partial game has been
   * finalized; strategies are disposed on every path.
   * @throws InvalidStateTransitionError if a game is already running
   */
  async playGame(options: PlayOptions = {}): Promise<GameResult> {
    this.phaseTracker.transition('initializing');

    const controller = new AbortController();
    this.controller = controller;
    const unlink = linkSignal(options.signal, controller);

    try {
      let termination: Termination<GameResult['reason']>;
      try {
        this.history.clear();
        this.board.resetToInitial();
        for (const strategy of this.strategies()) {
          await strategy.initialize(this.board);
        }
        await this.renderSignal.request();
        termination = await this.runTurns(controller.signal);
      } catch (err) {
        await this.finalizeAfterError(err);
        throw err;
      }

      const { notation, savedPath } = await this.finalize(termination);
      return {
        reason: termination.reason,
        winner: termination.winner,
        history: [...this.history.view],
        notation,
        savedPath,
      };
    } finally {
      unlink();
      this.controller = null;
      await this.disposeStrategies();
      if (this.phaseTracker.phase !== 'idle') {
        this.phaseTracker.reset();
      }
    }
  }

  private async runTurns(signal: AbortSignal): Promise<Termination<GameResult['reason']>> {
    let before = this.board.snapshot();

    for (;;) {
      if (signal.aborted) {
        return { reason: 'cancelled', winner: null };
      }

      this.phaseTracker.transition('awaiting-move');
      const side = this.board.currentMover();
      const strategy = this.players[side];
      this.observer.turnStarted?.(side, strategy);

      const move = await strategy.proposeMove(this.board, { history: this.history.view });
      if (!move) {
        this.logger.info(`${side} has no move`);
        return {
          reason: 'no-move',
          winner: this.board.isCheckmate(side) ? oppositeSide(side) : null,
        };
      }

      this.phaseTracker.transition('applying');
      this.board.applyMove(move);
      this.board.advanceTurn();
      const notation = formatCoordinateMove(move);
      this.history.append(notation);
      this.observer.moveApplied?.(side, notation, this.history.length);

      this.phaseTracker.transition('rendering');
      await this.renderSignal.request(
        this.board.toCoordinateLabel(move.fromRank, move.fromFile),
        this.board.toCoordinateLabel(move.toRank, move.toFile),
      );

      this.phaseTracker.transition('checking-termination');
      const after = this.board.snapshot();
      const mover = this.board.currentMover();
      if (after === before) {
        return { reason: 'stalled', winner: null };
      }
      if (this.board.isCheckmate(mover)) {
        return { reason: 'checkmate', winner: side };
      }
      if (this.history.length >= this.maxPlies) {
        return { reason: 'max-plies', winner: null };
      }
      before = after;

      try {
        await delay(this.paceMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) {
          return { reason: 'cancelled', winner: null };
        }
        throw err;
      }
    }
  }

  private async finalize(
    termination: Termination,
  ): Promise<{ notation: string; savedPath: string | undefined }> {
    this.phaseTracker.transition('finalizing');
    const history = [...this.history.view];
    this.logger.info(`Game over (${termination.reason}) after ${history.length} plies`);

    await this.notifyListeners({
      reason: termination.reason,
      winner: termination.winner,
      history,
      board: this.board,
      players: this.players,
    });

    this.board.resetToInitial();
    const notation = this.reconstructor.reconstruct(history, this.board);
    this.board.resetToInitial();

    let savedPath: string | undefined;
    if (history.length > 0) {
      savedPath = await this.saver.save(notation);
      this.logger.info(`Game saved to: ${savedPath}`);
    }

    this.phaseTracker.transition('idle');
    return { notation, savedPath };
  }

  /**
   * Save what was played before a failure. The original error is what the
   * caller sees, so a failure here is only logged.
   */
  private async finalizeAfterError(cause: unknown): Promise<void> {
    this.logger.warn(`Game aborted: ${errorMessage(cause)}`);
    try {
      await this.finalize({ reason: 'error', winner: null });
    } catch (err) {
      this.logger.warn(`Could not finalize aborted game: ${errorMessage(err)}`);
    }
  }

  private async notifyListeners(event: GameEndEvent): Promise<void> {
    for (const listener of [...this.listeners]) {
      try {
        await listener.onGameEnd(event);
      } catch (err) {
        this.logger.warn(`Game end listener failed: ${errorMessage(err)}`);
      }
    }
  }

  private strategies(): MoveStrategy[] {
    const { white, black } = this.players;
    return white === black ? [white] : [white, black];
  }

  private async disposeStrategies(): Promise<void> {
    for (const strategy of this.strategies()) {
      try {
        await strategy.dispose();
      } catch (err) {
        this.logger.warn(`Failed to release ${strategy.name}: ${errorMessage(err)}`);
      }
    }
  }
}
