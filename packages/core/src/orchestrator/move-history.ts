/**
 * Authoritative record of the moves played in the current game
 */

export class MoveHistory {
  private readonly moves: string[] = [];

  append(move: string): void {
    this.moves.push(move);
  }

  clear(): void {
    this.moves.length = 0;
  }

  get length(): number {
    return this.moves.length;
  }

  /**
   * Live read-only view; reflects later appends
   */
  get view(): readonly string[] {
    return this.moves;
  }
}
