/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

/**
 * Strategy assigned to a side
 */
export const strategyChoiceSchema = z.enum(['engine', 'random']);

/**
 * Board orientation for terminal output
 */
export const perspectiveSchema = z.enum(['white', 'black']);

const positiveIntSchema = z.number().int().min(1);

/**
 * Engine process configuration schema
 */
export const engineConfigSchema = z.object({
  path: z.string().min(1),
  args: z.array(z.string()),
  moveTimeMs: positiveIntSchema,
  handshakeTimeoutMs: z.number().int().min(100),
  options: z.record(z.union([z.string(), z.number(), z.boolean()])),
});

/**
 * Match configuration schema
 */
export const gameConfigSchema = z.object({
  white: strategyChoiceSchema,
  black: strategyChoiceSchema,
  games: positiveIntSchema,
  paceMs: z.number().int().min(0),
  maxPlies: positiveIntSchema,
  seed: z.number().int().optional(),
});

/**
 * Random playout lookahead schema
 */
export const searchConfigSchema = z.object({
  simulations: z.number().int().min(0).max(100000),
  explorationConstant: z.number().min(0),
  maxPlayoutPlies: positiveIntSchema,
});

/**
 * Output configuration schema
 */
export const outputConfigSchema = z.object({
  directory: z.string().min(1),
  showBoard: z.boolean(),
  perspective: perspectiveSchema,
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  engine: engineConfigSchema,
  game: gameConfigSchema,
  search: searchConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files)
 */
export const partialConfigSchema = z.object({
  engine: engineConfigSchema.partial().optional(),
  game: gameConfigSchema.partial().optional(),
  search: searchConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
});

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): z.infer<typeof configSchema> {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): z.infer<typeof partialConfigSchema> {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
