import { describe, it, expect } from 'vitest';

import { ChessBoard, parseCoordinateMove } from '@chessduel/board';
import type { BoardCapability } from '@chessduel/types';

import { DuplicateChildError, UnreachableMoveError } from '../errors.js';
import { GameTree } from '../tree/game-tree.js';
import type { GameNode } from '../tree/game-node.js';

function after(state: BoardCapability, move: string): BoardCapability {
  const next = state.clone();
  next.applyMove(parseCoordinateMove(move));
  next.advanceTurn();
  return next;
}

function extend(tree: GameTree, parent: GameNode, move: string): GameNode {
  return tree.addChild(parent, after(parent.state, move), parseCoordinateMove(move));
}

describe('GameTree', () => {
  it('starts with the cursor on the root', () => {
    const tree = new GameTree(new ChessBoard());

    expect(tree.getCurrent()).toBe(tree.getRoot());
    expect(tree.getRoot().isRoot).toBe(true);
    expect(tree.getRoot().move).toBeUndefined();
    expect(tree.size()).toBe(1);
  });

  describe('addChild', () => {
    it('links the new node under its parent without moving the cursor', () => {
      const tree = new GameTree(new ChessBoard());
      const child = extend(tree, tree.getRoot(), 'e2e4');

      expect(child.parent).toBe(tree.getRoot());
      expect(tree.getRoot().children).toHaveLength(1);
      expect(tree.getRoot().children[0]).toBe(child);
      expect(child.depth).toBe(1);
      expect(child.state.pieceAt(4, 4)).toBe(1);
      expect(tree.getCurrent()).toBe(tree.getRoot());
      expect(tree.size()).toBe(2);
    });

    it('does not check the move against the position', () => {
      const tree = new GameTree(new ChessBoard());
      const root = tree.getRoot();
      const child = tree.addChild(root, root.state.clone(), parseCoordinateMove('a1h8'));

      expect(child.move).toEqual(parseCoordinateMove('a1h8'));
    });

    it('rejects a second child for the same move', () => {
      const tree = new GameTree(new ChessBoard());
      extend(tree, tree.getRoot(), 'e2e4');

      expect(() => extend(tree, tree.getRoot(), 'e2e4')).toThrow(DuplicateChildError);
    });
  });

  describe('moveToChild', () => {
    it('replaying registered moves reaches the node built directly', () => {
      const tree = new GameTree(new ChessBoard());
      const e4 = extend(tree, tree.getRoot(), 'e2e4');
      extend(tree, tree.getRoot(), 'd2d4');
      const e5 = extend(tree, e4, 'e7e5');
      const nf3 = extend(tree, e5, 'g1f3');

      tree.moveToChild(parseCoordinateMove('e2e4'));
      tree.moveToChild(parseCoordinateMove('e7e5'));
      const reached = tree.moveToChild(parseCoordinateMove('g1f3'));

      expect(reached).toBe(nf3);
      expect(tree.getCurrent()).toBe(nf3);
      expect(nf3.depth).toBe(3);
    });

    it('throws for a move with no child and keeps the cursor', () => {
      const tree = new GameTree(new ChessBoard());
      extend(tree, tree.getRoot(), 'e2e4');

      expect(() => tree.moveToChild(parseCoordinateMove('d2d4'))).toThrow(UnreachableMoveError);
      expect(() => tree.moveToChild(parseCoordinateMove('d2d4'))).toThrow(
        'Move not found among children: d2d4',
      );
      expect(tree.getCurrent()).toBe(tree.getRoot());
    });
  });

  describe('resetToRoot', () => {
    it('reproduces a fresh traversal without changing the tree', () => {
      const tree = new GameTree(new ChessBoard());
      const e4 = extend(tree, tree.getRoot(), 'e2e4');
      const e5 = extend(tree, e4, 'e7e5');

      tree.moveToChild(parseCoordinateMove('e2e4'));
      tree.moveToChild(parseCoordinateMove('e7e5'));
      tree.resetToRoot();

      expect(tree.getCurrent()).toBe(tree.getRoot());
      expect(tree.size()).toBe(3);
      expect(tree.moveToChild(parseCoordinateMove('e2e4'))).toBe(e4);
      expect(tree.moveToChild(parseCoordinateMove('e7e5'))).toBe(e5);
    });

    it('is harmless on a tree that never moved', () => {
      const tree = new GameTree(new ChessBoard());
      expect(() => tree.resetToRoot()).not.toThrow();
      expect(tree.getCurrent()).toBe(tree.getRoot());
    });
  });

  describe('pathFromRoot', () => {
    it('lists the moves leading to a node', () => {
      const tree = new GameTree(new ChessBoard());
      const e4 = extend(tree, tree.getRoot(), 'e2e4');
      const c5 = extend(tree, e4, 'c7c5');

      expect(tree.pathFromRoot(c5)).toEqual([
        parseCoordinateMove('e2e4'),
        parseCoordinateMove('c7c5'),
      ]);
      expect(tree.pathFromRoot()).toEqual([]);
    });
  });

  describe('node statistics', () => {
    it('accumulates visits and score', () => {
      const tree = new GameTree(new ChessBoard());
      const node = tree.getRoot();

      node.incrementVisitCount();
      node.incrementVisitCount();
      node.addWinScore(1);
      node.addWinScore(0.5);

      expect(node.visitCount).toBe(2);
      expect(node.winScore).toBe(1.5);
    });
  });
});
