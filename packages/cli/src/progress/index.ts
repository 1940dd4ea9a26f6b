/**
 * Progress output exports
 */

export { GameReporter, formatScore, formatMoveLine, type GameReporterOptions } from './reporter.js';
export { REASON_NAMES, type ColorFn, type ColorFunctions } from './types.js';
