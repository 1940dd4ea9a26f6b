/**
 * Game Tree
 *
 * Rooted tree of positions mirroring move lineage, with a cursor
 * (`current`) that always points at a node reachable from the root.
 */

import type { BoardCapability, Move } from '@chessduel/types';
import { formatCoordinateMove } from '@chessduel/board';

import { DuplicateChildError, UnreachableMoveError } from '../errors.js';

import { GameNode } from './game-node.js';

export class GameTree {
  private readonly root: GameNode;
  private current: GameNode;
  private nodeCount = 1;

  constructor(initialState: BoardCapability) {
    this.root = new GameNode(initialState, undefined, undefined);
    this.current = this.root;
  }

  getRoot(): GameNode {
    return this.root;
  }

  getCurrent(): GameNode {
    return this.current;
  }

  /**
   * Link a new node under `parent`. The move is not checked for legality.
   *
   * @throws DuplicateChildError if `parent` already has a child for `move`
   */
  addChild(parent: GameNode, newBoardState: BoardCapability, move: Move): GameNode {
    if (parent.childFor(move)) {
      throw new DuplicateChildError(formatCoordinateMove(move));
    }
    const child = new GameNode(newBoardState, move, parent);
    parent.attach(child);
    this.nodeCount++;
    return child;
  }

  /**
   * Advance the cursor to the child of the current node reached by `move`
   *
   * @throws UnreachableMoveError if no such child exists
   */
  moveToChild(move: Move): GameNode {
    const child = this.current.childFor(move);
    if (!child) {
      throw new UnreachableMoveError(formatCoordinateMove(move));
    }
    this.current = child;
    return child;
  }

  resetToRoot(): void {
    this.current = this.root;
  }

  /**
   * Moves leading from the root to `node`
   */
  pathFromRoot(node: GameNode = this.current): Move[] {
    const path: Move[] = [];
    let cursor: GameNode | undefined = node;
    while (cursor && cursor.move) {
      path.push(cursor.move);
      cursor = cursor.parent;
    }
    return path.reverse();
  }

  size(): number {
    return this.nodeCount;
  }
}
