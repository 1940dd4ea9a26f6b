/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Game file could not be written
 */
export class OutputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'OutputError';
  }
}

/**
 * The configured engine could not be launched or did not answer the handshake
 */
export class EngineUnavailableError extends CliError {
  constructor(
    public readonly enginePath: string,
    cause?: Error,
  ) {
    super(
      `Engine '${enginePath}' is not available${cause ? ` (${cause.message})` : ''}`,
      `Install a UCI engine such as Stockfish, or pass its location with --engine <path>`,
    );
    this.name = 'EngineUnavailableError';
  }

  override format(): string {
    return [
      `Error [engine]: ${this.message}`,
      '',
      `Suggestion: ${this.suggestion ?? ''}`,
    ].join('\n');
  }
}
