/**
 * Board Visualization
 *
 * Renders a board as ASCII for terminal display after each move.
 * Uses brackets to distinguish pieces from empty squares.
 */

import type { BoardCapability, PieceCode } from '@chessduel/types';

import { parseSquare } from '../moves/coordinate-move.js';

/**
 * Board orientation perspective
 */
export type Perspective = 'white' | 'black';

/**
 * Options for board rendering
 */
export interface BoardRenderOptions {
  /** Board orientation (default: 'white') */
  perspective?: Perspective;
  /** Squares of the last move, drawn with angle brackets */
  highlight?: { from: string; to: string };
}

const PIECE_SYMBOLS = ['', 'p', 'r', 'n', 'b', 'q', 'k'];

/**
 * FEN-style letter for a piece code: uppercase White, lowercase Black
 */
export function pieceSymbol(code: PieceCode): string {
  const symbol = PIECE_SYMBOLS[Math.abs(code)] ?? '';
  return code > 0 ? symbol.toUpperCase() : symbol;
}

/**
 * Render a board as ASCII
 *
 * Example output after 1. e4 with highlighting:
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r] [n] [b] [q] [k] [b] [n] [r]  8
 * 7 [p] [p] [p] [p] [p] [p] [p] [p]  7
 * 6  .   .   .   .   .   .   .   .   6
 * 5  .   .   .   .   .   .   .   .   5
 * 4  .   .   .   .  <P>  .   .   .   4
 * 3  .   .   .   .   .   .   .   .   3
 * 2 [P] [P] [P] [P] < > [P] [P] [P]  2
 * 1 [R] [N] [B] [Q] [K] [B] [N] [R]  1
 *    a   b   c   d   e   f   g   h
 * ```
 */
export function renderBoard(board: BoardCapability, options?: BoardRenderOptions): string {
  const perspective = options?.perspective ?? 'white';
  const from = options?.highlight ? parseSquare(options.highlight.from) : null;
  const to = options?.highlight ? parseSquare(options.highlight.to) : null;

  const isHighlighted = (rank: number, file: number): boolean =>
    (from !== null && from.rank === rank && from.file === file) ||
    (to !== null && to.rank === rank && to.file === file);

  const files =
    perspective === 'white'
      ? ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h']
      : ['h', 'g', 'f', 'e', 'd', 'c', 'b', 'a'];
  const rankIndices = perspective === 'white' ? [0, 1, 2, 3, 4, 5, 6, 7] : [7, 6, 5, 4, 3, 2, 1, 0];

  const lines: string[] = [];
  lines.push(`   ${files.join('   ')}`);

  for (const rankIdx of rankIndices) {
    const rankNum = 8 - rankIdx;
    const squares: string[] = [];

    for (let fileIdx = 0; fileIdx < 8; fileIdx++) {
      const actualFileIdx = perspective === 'white' ? fileIdx : 7 - fileIdx;
      const code = board.pieceAt(rankIdx, actualFileIdx);
      const highlighted = isHighlighted(rankIdx, actualFileIdx);

      if (code !== 0) {
        const symbol = pieceSymbol(code);
        squares.push(highlighted ? `<${symbol}>` : `[${symbol}]`);
      } else {
        squares.push(highlighted ? '< >' : ' . ');
      }
    }

    lines.push(`${rankNum} ${squares.join(' ')}  ${rankNum}`);
  }

  lines.push(`   ${files.join('   ')}`);

  return lines.join('\n');
}
