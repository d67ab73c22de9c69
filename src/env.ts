import { z } from 'zod';
import type { LogSink } from '../lib/logger.js';

// =================================================================================
// Process configuration
// =================================================================================

const booleanFlag = (fallback: boolean) =>
  z.enum(['true', 'false', '1', '0']).optional().transform(value =>
    value === undefined ? fallback : value === 'true' || value === '1'
  );

/**
 * Environment variables, all optional
 */
const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5100),
  CACHE_DIR: z.string().min(1).default('./cache'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  STRUCTURED_LOGGING: booleanFlag(false),

  TMDB_API_KEY: z.string().optional(),
  POMS_API_KEY: z.string().min(1).default('placeholder-key'),
  POMS_API_SECRET: z.string().min(1).default('placeholder-secret'),

  TITLE_SIMILARITY_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.7),
  YEAR_TOLERANCE: z.coerce.number().int().min(0).max(10).default(2),

  CACHE_TTL_FOUND_DAYS: z.coerce.number().positive().default(30),
  CACHE_TTL_NOT_FOUND_DAYS: z.coerce.number().positive().default(7),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(10_000),
  CACHE_MAX_SIZE_MB: z.coerce.number().positive().default(500),

  CREDENTIAL_COOLDOWN_SECONDS: z.coerce.number().nonnegative().default(60),
  RATE_LIMIT_MAX_WAIT_SECONDS: z.coerce.number().nonnegative().default(60),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  HTTP_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  WEB_FALLBACK_ENABLED: booleanFlag(true),
  API_RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),
});

export type Env = z.input<typeof EnvSchema>;
export type AppConfig = z.output<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from an environment map (defaults to process.env)
 *
 * Empty strings count as unset.
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
}

// =================================================================================
// Hono bindings
// =================================================================================

// Extend Hono Context with custom variables
export type Variables = {
  startTime: number;
  requestId: string; // Unique request ID for log tracing (x-request-id or UUID)
  logger: LogSink;
};

export type AppBindings = {
  Variables: Variables;
};
