/**
 * Random playout strategy
 *
 * Picks uniformly among the legal moves, or, with `simulations` set,
 * plays the move a Monte Carlo search from the current position visits most.
 * Keeps per-instance learning statistics across games.
 */

import type { BoardCapability, Logger, Move } from '@chessduel/types';
import { formatCoordinateMove, parseCoordinateMove } from '@chessduel/board';

import {
  createProcessRandom,
  createSeededRandom,
  randomIndex,
  type RandomSource,
} from '../random/mulberry32.js';
import { DEFAULT_MAX_PLAYOUT_PLIES, MonteCarloSimulator } from '../search/monte-carlo-simulator.js';
import { DEFAULT_EXPLORATION_CONSTANT } from '../search/uct-selector.js';
import { GameTree } from '../tree/game-tree.js';

import type { StrategyBase, StrategyContext } from './types.js';

export interface RandomPlayoutOptions {
  /** Random source; takes precedence over `seed` */
  random?: RandomSource;
  /** Seed for a reproducible random source */
  seed?: number;
  /** Monte Carlo iterations per move; 0 picks uniformly (default: 0) */
  simulations?: number;
  explorationConstant?: number;
  maxPlayoutPlies?: number;
  logger?: Logger;
}

/**
 * Snapshot of what the strategy has learned
 */
export interface LearningStatistics {
  readonly games: number;
  readonly wins: number;
  readonly losses: number;
  readonly draws: number;
  /** Success counter per move the strategy has played */
  readonly moves: ReadonlyMap<string, number>;
}

export class RandomPlayoutStrategy implements StrategyBase {
  readonly kind = 'random-playout' as const;
  readonly name: string = 'random';

  private readonly random: RandomSource;
  private readonly simulations: number;
  private readonly explorationConstant: number;
  private readonly maxPlayoutPlies: number;
  private readonly logger: Logger;

  private games = 0;
  private wins = 0;
  private losses = 0;
  private draws = 0;
  private readonly moveStatistics = new Map<string, number>();

  /** Lookahead tree for the running game, rooted at its starting position */
  private tree: GameTree | undefined;
  private simulator: MonteCarloSimulator | undefined;
  /** Ply of the tree's root, and how many history entries the cursor has followed */
  private rootPly = 0;
  private followedPlies = 0;

  constructor(options: RandomPlayoutOptions = {}) {
    this.random =
      options.random ??
      (options.seed !== undefined ? createSeededRandom(options.seed) : createProcessRandom());
    this.simulations = options.simulations ?? 0;
    this.explorationConstant = options.explorationConstant ?? DEFAULT_EXPLORATION_CONSTANT;
    this.maxPlayoutPlies = options.maxPlayoutPlies ?? DEFAULT_MAX_PLAYOUT_PLIES;
    this.logger = options.logger ?? console;
  }

  async initialize(board: BoardCapability): Promise<void> {
    this.dropTree();
    if (this.simulations > 0) {
      this.plantTree(board, 0);
    }
  }

  async proposeMove(board: BoardCapability, context: StrategyContext): Promise<Move | null> {
    const moves = board.legalMoves(board.currentMover());
    if (moves.length === 0) {
      return null;
    }

    const move =
      (this.simulations > 0 ? this.search(board, context.history, moves.length) : undefined) ??
      moves[randomIndex(this.random, moves.length)];
    if (!move) {
      return null;
    }

    const notation = formatCoordinateMove(move);
    if (!this.moveStatistics.has(notation)) {
      this.moveStatistics.set(notation, 0);
    }
    return move;
  }

  /**
   * Drops the game's lookahead tree; learning state outlives the game
   */
  async dispose(): Promise<void> {
    this.dropTree();
  }

  /**
   * Count a finished game; `win`, `loss` and `draw` (any case) are also tallied
   */
  recordOutcome(result: string): void {
    this.games++;
    switch (result.toLowerCase()) {
      case 'win':
        this.wins++;
        break;
      case 'loss':
        this.losses++;
        break;
      case 'draw':
        this.draws++;
        break;
    }
    this.logger.debug(
      `Game result recorded: ${result} (games ${this.games}, wins ${this.wins}, losses ${this.losses}, draws ${this.draws})`,
    );
  }

  /**
   * Credit a move; the counter only grows on success
   */
  updateMoveStatistics(move: string, isSuccess: boolean): void {
    this.moveStatistics.set(move, (this.moveStatistics.get(move) ?? 0) + (isSuccess ? 1 : 0));
  }

  /**
   * Success counter for `move`, or undefined if it was never played or credited
   */
  getMoveCount(move: string): number | undefined {
    return this.moveStatistics.get(move);
  }

  /**
   * Lookahead tree of the running game, if searching is enabled
   */
  getTree(): GameTree | undefined {
    return this.tree;
  }

  getStatistics(): LearningStatistics {
    return {
      games: this.games,
      wins: this.wins,
      losses: this.losses,
      draws: this.draws,
      moves: new Map(this.moveStatistics),
    };
  }

  private search(
    board: BoardCapability,
    history: readonly string[],
    legalMoveCount: number,
  ): Move | undefined {
    const simulator =
      this.simulator && history.length >= this.rootPly
        ? this.simulator
        : this.plantTree(board, history.length);
    this.follow(history);
    if (legalMoveCount < 2) {
      return undefined;
    }
    simulator.run(this.simulations);
    return simulator.selectBestMove();
  }

  private plantTree(board: BoardCapability, ply: number): MonteCarloSimulator {
    const tree = new GameTree(board.clone());
    const simulator = new MonteCarloSimulator(tree, {
      random: this.random,
      explorationConstant: this.explorationConstant,
      maxPlayoutPlies: this.maxPlayoutPlies,
    });
    this.tree = tree;
    this.simulator = simulator;
    this.rootPly = ply;
    this.followedPlies = ply;
    return simulator;
  }

  /**
   * Walk the cursor along the moves played since the last proposal,
   * expanding nodes the search never reached
   */
  private follow(history: readonly string[]): void {
    const tree = this.tree;
    if (!tree) return;

    if (history.length < this.followedPlies) {
      tree.resetToRoot();
      this.followedPlies = this.rootPly;
    }
    for (const notation of history.slice(this.followedPlies)) {
      const move = parseCoordinateMove(notation);
      const current = tree.getCurrent();
      if (!current.childFor(move)) {
        const state = current.state.clone();
        state.applyMove(move);
        state.advanceTurn();
        tree.addChild(current, state, move);
      }
      tree.moveToChild(move);
    }
    this.followedPlies = history.length;
  }

  private dropTree(): void {
    this.tree = undefined;
    this.simulator = undefined;
    this.rootPly = 0;
    this.followedPlies = 0;
  }
}
