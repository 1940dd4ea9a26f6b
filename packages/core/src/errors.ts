/**
 * Error classes for game orchestration
 */

/**
 * Error thrown when the tree has no child for the requested move
 */
export class UnreachableMoveError extends Error {
  constructor(public readonly move: string) {
    super(`Move not found among children: ${move}`);
    this.name = 'UnreachableMoveError';
  }
}

/**
 * Error thrown when a node already has a child for the move being added
 */
export class DuplicateChildError extends Error {
  constructor(public readonly move: string) {
    super(`Node already has a child for move: ${move}`);
    this.name = 'DuplicateChildError';
  }
}

/**
 * Error thrown when the turn loop attempts a transition its table does not allow
 */
export class InvalidStateTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid game phase transition: ${from} -> ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

/**
 * Error thrown when a render is requested while another is outstanding
 */
export class RenderInFlightError extends Error {
  constructor() {
    super('A render request is already outstanding');
    this.name = 'RenderInFlightError';
  }
}

/**
 * Error thrown when a finished game cannot be written
 */
export class GameSaveError extends Error {
  constructor(
    public readonly directory: string,
    cause?: Error,
  ) {
    super(`Failed to save game in ${directory}${cause ? `: ${cause.message}` : ''}`);
    this.name = 'GameSaveError';
  }
}
