/**
 * Monte Carlo Simulator
 *
 * Grows the game tree from its current node by repeated
 * select / expand / playout / backpropagate iterations on cloned boards.
 * The shared game board is never touched.
 */

import type { BoardCapability, Move, Side } from '@chessduel/types';
import { oppositeSide } from '@chessduel/types';

import { createProcessRandom, randomIndex, type RandomSource } from '../random/mulberry32.js';
import type { GameNode } from '../tree/game-node.js';
import type { GameTree } from '../tree/game-tree.js';

import { DEFAULT_EXPLORATION_CONSTANT, selectChild } from './uct-selector.js';

export interface SimulatorOptions {
  /** UCT exploration constant (default: sqrt(2)) */
  explorationConstant?: number;
  /** Playouts stop here and count as a draw (default: 40) */
  maxPlayoutPlies?: number;
  random?: RandomSource;
}

export const DEFAULT_MAX_PLAYOUT_PLIES = 40;

/**
 * Winner of a playout, or null for a draw or an unfinished playout
 */
export type PlayoutResult = Side | null;

function scoreFor(side: Side, result: PlayoutResult): number {
  if (result === null) return 0.5;
  return result === side ? 1 : 0;
}

export class MonteCarloSimulator {
  private readonly explorationConstant: number;
  private readonly maxPlayoutPlies: number;
  private readonly random: RandomSource;

  constructor(
    private readonly tree: GameTree,
    options: SimulatorOptions = {},
  ) {
    this.explorationConstant = options.explorationConstant ?? DEFAULT_EXPLORATION_CONSTANT;
    this.maxPlayoutPlies = options.maxPlayoutPlies ?? DEFAULT_MAX_PLAYOUT_PLIES;
    this.random = options.random ?? createProcessRandom();
  }

  /**
   * Run `iterations` simulations from the tree's current node
   */
  run(iterations: number): void {
    for (let i = 0; i < iterations; i++) {
      this.iterate();
    }
  }

  /**
   * Move of the most visited child of the current node (first on ties)
   */
  selectBestMove(): Move | undefined {
    let best: GameNode | undefined;
    for (const child of this.tree.getCurrent().children) {
      if (!best || child.visitCount > best.visitCount) {
        best = child;
      }
    }
    return best?.move;
  }

  private iterate(): void {
    const root = this.tree.getCurrent();

    let node = root;
    let untried = this.untriedMoves(node);
    while (untried.length === 0) {
      const next = selectChild(node, this.explorationConstant);
      if (!next) break;
      node = next;
      untried = this.untriedMoves(node);
    }

    const move = untried[randomIndex(this.random, untried.length)];
    if (move) {
      const state = node.state.clone();
      state.applyMove(move);
      state.advanceTurn();
      node = this.tree.addChild(node, state, move);
    }

    const result = this.playout(node.state.clone());
    this.backpropagate(node, root, result);
  }

  private untriedMoves(node: GameNode): Move[] {
    const { state } = node;
    return state.legalMoves(state.currentMover()).filter((move) => !node.childFor(move));
  }

  private playout(board: BoardCapability): PlayoutResult {
    for (let ply = 0; ply <= this.maxPlayoutPlies; ply++) {
      const mover = board.currentMover();
      const moves = board.legalMoves(mover);
      if (moves.length === 0) {
        return board.isCheckmate(mover) ? oppositeSide(mover) : null;
      }
      if (ply === this.maxPlayoutPlies) break;

      const move = moves[randomIndex(this.random, moves.length)];
      if (!move) break;
      board.applyMove(move);
      board.advanceTurn();
    }
    return null;
  }

  /**
   * Each node is scored for the side that made the move into it,
   * which is the side choosing among it and its siblings.
   */
  private backpropagate(leaf: GameNode, root: GameNode, result: PlayoutResult): void {
    let node: GameNode | undefined = leaf;
    while (node) {
      node.incrementVisitCount();
      node.addWinScore(scoreFor(oppositeSide(node.state.currentMover()), result));
      if (node === root) break;
      node = node.parent;
    }
  }
}
