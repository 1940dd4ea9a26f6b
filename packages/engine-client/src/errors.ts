/**
 * Error classes for engine process communication
 */

/**
 * Base error class for engine client errors
 */
export class EngineClientError extends Error {
  constructor(
    message: string,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'EngineClientError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineClientError);
    }
  }
}

/**
 * Error thrown when the engine process cannot be started or fails its handshake
 */
export class EngineStartError extends EngineClientError {
  constructor(
    public readonly enginePath: string,
    cause?: Error,
  ) {
    super(
      `Failed to start engine '${enginePath}'${cause ? `: ${cause.message}` : ''}`,
      cause?.message,
    );
    this.name = 'EngineStartError';
  }
}

/**
 * Error thrown when the engine does not answer in time
 */
export class EngineTimeoutError extends EngineClientError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Error thrown when the engine sends a line that cannot be understood
 */
export class EngineProtocolError extends EngineClientError {
  constructor(
    public readonly line: string,
    expected: string,
  ) {
    super(`Unexpected engine output "${line}" (expected ${expected})`);
    this.name = 'EngineProtocolError';
  }
}

/**
 * Error thrown when the engine process is gone while a reply is pending
 */
export class EngineClosedError extends EngineClientError {
  constructor(
    public readonly operation: string,
    public readonly exitCode: number | null = null,
    cause?: Error,
  ) {
    super(
      `Engine closed during '${operation}'${exitCode !== null ? ` (exit code ${exitCode})` : ''}${
        cause ? `: ${cause.message}` : ''
      }`,
      cause?.message,
    );
    this.name = 'EngineClosedError';
  }
}
