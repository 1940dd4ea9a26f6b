import { describe, it, expect } from 'vitest';

import { ChessBoard, formatCoordinateMove, parseCoordinateMove } from '@chessduel/board';
import { createNullLogger } from '@chessduel/test-utils';

import { RandomPlayoutStrategy } from '../strategies/random-playout.js';

// White: king h1 boxed in by the queen on f2, pawn a2 free to step once
const ONE_MOVE_FEN = 'k7/8/8/8/p7/8/P4q2/7K w - - 0 1';
// Same position without the pawn: stalemate
const NO_MOVE_FEN = 'k7/8/8/8/8/8/5q2/7K w - - 0 1';

const context = { history: [] };

describe('RandomPlayoutStrategy', () => {
  it('returns the only legal move', async () => {
    const strategy = new RandomPlayoutStrategy({ seed: 1, logger: createNullLogger() });
    const move = await strategy.proposeMove(ChessBoard.fromFen(ONE_MOVE_FEN), context);

    expect(move).toEqual({ fromRank: 6, fromFile: 0, toRank: 5, toFile: 0 });
  });

  it('returns null when the side to move has no legal move', async () => {
    const strategy = new RandomPlayoutStrategy({ seed: 1, logger: createNullLogger() });
    const move = await strategy.proposeMove(ChessBoard.fromFen(NO_MOVE_FEN), context);

    expect(move).toBeNull();
    expect(strategy.getStatistics().moves.size).toBe(0);
  });

  it('plays the same moves for the same seed', async () => {
    const play = async (): Promise<string[]> => {
      const strategy = new RandomPlayoutStrategy({ seed: 42, logger: createNullLogger() });
      const board = new ChessBoard();
      const moves: string[] = [];
      for (let ply = 0; ply < 6; ply++) {
        const move = await strategy.proposeMove(board, context);
        if (!move) break;
        board.applyMove(move);
        board.advanceTurn();
        moves.push(formatCoordinateMove(move));
      }
      return moves;
    };

    const first = await play();
    expect(first).toHaveLength(6);
    expect(await play()).toEqual(first);
  });

  it('does not change the board it is asked about', async () => {
    const strategy = new RandomPlayoutStrategy({ seed: 5, logger: createNullLogger() });
    const board = new ChessBoard();

    await strategy.proposeMove(board, context);

    expect(board.snapshot()).toBe(new ChessBoard().snapshot());
    expect(board.currentMover()).toBe('white');
  });

  it('can choose through Monte Carlo lookahead', async () => {
    const strategy = new RandomPlayoutStrategy({
      seed: 9,
      simulations: 25,
      maxPlayoutPlies: 2,
      logger: createNullLogger(),
    });
    const board = new ChessBoard();

    const move = await strategy.proposeMove(board, context);

    expect(move).not.toBeNull();
    const legal = board.legalMoves('white').map(formatCoordinateMove);
    expect(legal).toContain(move ? formatCoordinateMove(move) : '');
    expect(board.snapshot()).toBe(new ChessBoard().snapshot());
  });

  describe('lookahead tree', () => {
    const searching = { seed: 3, simulations: 30, maxPlayoutPlies: 4, logger: createNullLogger() };

    const play = (board: ChessBoard, history: string[]): void => {
      for (const notation of history) {
        board.applyMove(parseCoordinateMove(notation));
        board.advanceTurn();
      }
    };

    it('is planted at game start and dropped on dispose', async () => {
      const strategy = new RandomPlayoutStrategy(searching);

      await strategy.initialize(new ChessBoard());
      expect(strategy.getTree()?.size()).toBe(1);

      await strategy.dispose();
      expect(strategy.getTree()).toBeUndefined();
    });

    it('is not planted without simulations', async () => {
      const strategy = new RandomPlayoutStrategy({ seed: 3, logger: createNullLogger() });

      await strategy.initialize(new ChessBoard());

      expect(strategy.getTree()).toBeUndefined();
    });

    it('keeps subtree statistics from one proposal to the next', async () => {
      const strategy = new RandomPlayoutStrategy(searching);
      const board = new ChessBoard();
      await strategy.initialize(board);

      const first = await strategy.proposeMove(board, { history: [] });
      const tree = strategy.getTree();
      // 30 iterations over 20 opening moves leave the most visited one with a reply below it
      const chosen = first ? tree?.getRoot().childFor(first) : undefined;
      const reply = chosen?.children[0];
      if (!first || !tree || !reply?.move) {
        throw new Error('search left no reply under the chosen move');
      }
      expect(tree.getRoot().visitCount).toBe(30);
      const carried = reply.visitCount;
      expect(carried).toBeGreaterThan(0);

      const history = [formatCoordinateMove(first), formatCoordinateMove(reply.move)];
      play(board, history);
      await strategy.proposeMove(board, { history });

      expect(strategy.getTree()).toBe(tree);
      expect(tree.getCurrent()).toBe(reply);
      expect(reply.visitCount).toBe(carried + 30);
      expect(tree.getRoot().visitCount).toBe(30);
    });

    it('expands moves the search never reached', async () => {
      const strategy = new RandomPlayoutStrategy({ ...searching, simulations: 1 });
      const board = new ChessBoard();
      await strategy.initialize(board);

      const history = ['e2e4', 'e7e5'];
      play(board, history);
      await strategy.proposeMove(board, { history });

      const tree = strategy.getTree();
      expect(tree?.pathFromRoot().map(formatCoordinateMove)).toEqual(history);
      expect(tree?.getCurrent().visitCount).toBe(1);
    });

    it('returns to the root when the history starts over', async () => {
      const strategy = new RandomPlayoutStrategy({ ...searching, simulations: 1 });
      const board = new ChessBoard();
      await strategy.initialize(board);
      play(board, ['d2d4']);
      await strategy.proposeMove(board, { history: ['d2d4'] });

      await strategy.proposeMove(new ChessBoard(), { history: [] });

      const tree = strategy.getTree();
      expect(tree?.getCurrent()).toBe(tree?.getRoot());
    });
  });

  describe('move statistics', () => {
    it('registers proposed moves at zero and leaves others absent', async () => {
      const strategy = new RandomPlayoutStrategy({ seed: 1, logger: createNullLogger() });
      await strategy.proposeMove(ChessBoard.fromFen(ONE_MOVE_FEN), context);

      expect(strategy.getMoveCount('a2a3')).toBe(0);
      expect(strategy.getMoveCount('e2e4')).toBeUndefined();
    });

    it('only ever grows, and only on success', async () => {
      const strategy = new RandomPlayoutStrategy({ seed: 1, logger: createNullLogger() });
      await strategy.proposeMove(ChessBoard.fromFen(ONE_MOVE_FEN), context);

      strategy.updateMoveStatistics('a2a3', true);
      expect(strategy.getMoveCount('a2a3')).toBe(1);
      strategy.updateMoveStatistics('a2a3', false);
      expect(strategy.getMoveCount('a2a3')).toBe(1);

      // Proposing the move again does not reset it
      await strategy.proposeMove(ChessBoard.fromFen(ONE_MOVE_FEN), context);
      expect(strategy.getMoveCount('a2a3')).toBe(1);
    });

    it('returns snapshots that later changes do not affect', async () => {
      const strategy = new RandomPlayoutStrategy({ seed: 1, logger: createNullLogger() });
      const before = strategy.getStatistics();

      await strategy.proposeMove(ChessBoard.fromFen(ONE_MOVE_FEN), context);

      expect(before.moves.size).toBe(0);
      expect(strategy.getStatistics().moves.get('a2a3')).toBe(0);
    });
  });

  describe('recordOutcome', () => {
    it('counts every game and tallies known results in any case', () => {
      const strategy = new RandomPlayoutStrategy({ seed: 1, logger: createNullLogger() });

      strategy.recordOutcome('WIN');
      strategy.recordOutcome('loss');
      strategy.recordOutcome('Draw');
      strategy.recordOutcome('abandoned');

      const { games, wins, losses, draws } = strategy.getStatistics();
      expect({ games, wins, losses, draws }).toEqual({ games: 4, wins: 1, losses: 1, draws: 1 });
    });
  });
});
