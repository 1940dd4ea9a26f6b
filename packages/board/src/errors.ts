/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when an illegal move is attempted
 */
export class IllegalMoveError extends Error {
  constructor(move: string, fen: string) {
    super(`Illegal move "${move}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}

/**
 * Error thrown when board coordinates fall outside the 8x8 grid
 */
export class InvalidSquareError extends Error {
  constructor(
    public readonly rank: number,
    public readonly file: number,
  ) {
    super(`Square (${rank}, ${file}) is off the board`);
    this.name = 'InvalidSquareError';
  }
}

/**
 * Error thrown when a coordinate move string cannot be decoded
 */
export class InvalidMoveNotationError extends Error {
  constructor(public readonly notation: string) {
    super(`Invalid coordinate move: "${notation}"`);
    this.name = 'InvalidMoveNotationError';
  }
}
