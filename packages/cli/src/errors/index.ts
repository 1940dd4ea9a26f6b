/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  OutputError,
  EngineUnavailableError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, exitCodeFor, handleError } from './handler.js';
