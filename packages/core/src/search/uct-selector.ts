/**
 * UCT selection policy
 *
 * score(child) = winScore / visits + c * sqrt(ln(parentVisits) / visits)
 */

import type { GameNode } from '../tree/game-node.js';

export const DEFAULT_EXPLORATION_CONSTANT = Math.SQRT2;

/**
 * UCT score of a child whose parent has `parentVisits` visits.
 * Unvisited children score Infinity so each is tried once before any is revisited.
 */
export function uctScore(
  child: GameNode,
  parentVisits: number,
  explorationConstant: number = DEFAULT_EXPLORATION_CONSTANT,
): number {
  if (child.visitCount === 0) {
    return Number.POSITIVE_INFINITY;
  }
  const exploitation = child.winScore / child.visitCount;
  const exploration =
    explorationConstant * Math.sqrt(Math.log(Math.max(parentVisits, 1)) / child.visitCount);
  return exploitation + exploration;
}

/**
 * Child of `node` with the highest UCT score; the first one wins ties.
 * Returns undefined when `node` has no children.
 */
export function selectChild(
  node: GameNode,
  explorationConstant: number = DEFAULT_EXPLORATION_CONSTANT,
): GameNode | undefined {
  let best: GameNode | undefined;
  let bestScore = Number.NEGATIVE_INFINITY;

  for (const child of node.children) {
    const score = uctScore(child, node.visitCount, explorationConstant);
    if (best === undefined || score > bestScore) {
      best = child;
      bestScore = score;
    }
  }

  return best;
}
