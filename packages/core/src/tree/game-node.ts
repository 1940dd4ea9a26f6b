/**
 * Game Node
 *
 * One position in the game tree: the board as it stands after `move`,
 * plus the visit statistics accumulated by simulation.
 */

import type { BoardCapability, Move } from '@chessduel/types';
import { movesEqual } from '@chessduel/board';

export class GameNode {
  private readonly childNodes: GameNode[] = [];
  private visits = 0;
  private score = 0;

  /**
   * @param state - Board snapshot owned by this node
   * @param move - Move that produced the position (undefined for the root)
   * @param parent - Back-reference, not owning (undefined for the root)
   */
  constructor(
    readonly state: BoardCapability,
    readonly move: Move | undefined,
    readonly parent: GameNode | undefined,
  ) {}

  get children(): readonly GameNode[] {
    return this.childNodes;
  }

  get visitCount(): number {
    return this.visits;
  }

  get winScore(): number {
    return this.score;
  }

  get isRoot(): boolean {
    return this.parent === undefined;
  }

  /**
   * Number of moves from the root
   */
  get depth(): number {
    let depth = 0;
    for (let node = this.parent; node; node = node.parent) {
      depth++;
    }
    return depth;
  }

  incrementVisitCount(): void {
    this.visits++;
  }

  addWinScore(score: number): void {
    this.score += score;
  }

  /**
   * The child reached by `move`, if one has been added
   */
  childFor(move: Move): GameNode | undefined {
    return this.childNodes.find((child) => child.move !== undefined && movesEqual(child.move, move));
  }

  /** @internal used by GameTree.addChild */
  attach(child: GameNode): void {
    this.childNodes.push(child);
  }
}
