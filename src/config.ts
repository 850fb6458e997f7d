/**
 * Centralized Configuration Module
 *
 * Loads configuration for the statistics tutor from environment variables and
 * validates it with zod. The resulting object is parsed once at module load
 * and shared by the CLI, the storage layer and the LLM collaborator.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.database.path);
 *   validateConfig(); // throws ConfigValidationError when unusable
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  database: z.object({
    path: z.string().min(1).default('stats-tutor.db'),
  }),

  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(1024),
    // Applied to every collaborator call; an expired call degrades like any other failure
    timeoutMs: z.number().int().positive().default(30000),
  }),

  dedup: z
    .object({
      newThreshold: z.number().min(0).max(1).default(0.5),
      duplicateThreshold: z.number().min(0).max(1).default(0.9),
    })
    .refine((value) => value.newThreshold <= value.duplicateThreshold, {
      message: 'newThreshold must not exceed duplicateThreshold',
    }),

  scheduler: z.object({
    graduationThreshold: z.number().int().positive().default(2),
    masteryIntervalDays: z.number().positive().default(90),
  }),
});

export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function parseNodeEnv(value: string | undefined): Config['nodeEnv'] | undefined {
  const result = configSchema.shape.nodeEnv.safeParse(value);
  return result.success ? result.data : undefined;
}

/**
 * Reads the raw configuration from an environment map.
 * Missing values are left undefined so the schema defaults apply.
 */
export function loadFromEnvironment(
  env: NodeJS.ProcessEnv = process.env
): z.input<typeof configSchema> {
  return {
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    database: {
      path: env.DATABASE_PATH || undefined,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || undefined,
      model: env.ANTHROPIC_MODEL || undefined,
      maxTokens: parseIntOrUndefined(env.ANTHROPIC_MAX_TOKENS),
      timeoutMs: parseIntOrUndefined(env.COLLABORATOR_TIMEOUT_MS),
    },
    dedup: {
      newThreshold: parseFloatOrUndefined(env.DEDUP_NEW_THRESHOLD),
      duplicateThreshold: parseFloatOrUndefined(env.DEDUP_DUPLICATE_THRESHOLD),
    },
    scheduler: {
      graduationThreshold: parseIntOrUndefined(env.SCHEDULER_GRADUATION_THRESHOLD),
      masteryIntervalDays: parseFloatOrUndefined(env.SCHEDULER_MASTERY_INTERVAL_DAYS),
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with the offending variables attached.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses an environment map into a validated Config.
 *
 * @throws {ConfigValidationError} when a value is out of range
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse(loadFromEnvironment(env));
  if (!result.success) {
    const invalidVars = result.error.issues.map((issue) => ({
      name: issue.path.join('.'),
      reason: issue.message,
    }));
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
      [],
      invalidVars
    );
  }
  return result.data;
}

/**
 * Checks the settings a tutoring session cannot run without.
 *
 * Only the collaborator needs an API key; read-only commands such as
 * `facts` and `history` skip this check.
 *
 * @throws {ConfigValidationError} if ANTHROPIC_API_KEY is missing
 */
export function validateConfig(current: Config = config): void {
  if (!current.anthropic.apiKey) {
    throw new ConfigValidationError(
      'Missing required environment variables: ANTHROPIC_API_KEY',
      ['ANTHROPIC_API_KEY']
    );
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

/**
 * The validated configuration, parsed once at module load.
 */
export const config: Config = parseConfig();

export function getDatabasePath(): string {
  return config.database.path;
}

export function getAnthropicApiKey(): string | undefined {
  return config.anthropic.apiKey;
}

export default config;
