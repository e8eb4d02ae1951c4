/**
 * Environment Variable Validation
 *
 * Validates the sync configuration on startup using Zod schemas and turns
 * failures into messages an operator can act on.
 */

import { z } from 'zod';

/**
 * Custom error class for environment validation failures
 */
export class EnvValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError['errors'],
    public readonly suggestions: string[]
  ) {
    super(message);
    this.name = 'EnvValidationError';
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines: string[] = [this.message, ''];

    if (this.errors.length > 0) {
      lines.push('Validation errors:');
      for (const error of this.errors) {
        const path = error.path.join('.');
        lines.push(`  - ${path}: ${error.message}`);
      }
      lines.push('');
    }

    if (this.suggestions.length > 0) {
      lines.push('Suggestions:');
      for (const suggestion of this.suggestions) {
        lines.push(`  - ${suggestion}`);
      }
    }

    return lines.join('\n');
  }
}

// ============================================================================
// Helper Schemas
// ============================================================================

/** Integer from string with bounds and a default */
const boundedInt = (min: number, max: number, defaultVal: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultVal))
    .pipe(z.number().int().min(min).max(max));

/** Optional integer from string; absent stays undefined */
const optionalInt = (min: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : undefined))
    .pipe(z.number().int().min(min).optional());

/** Blank values, as left by an unfilled .env line, count as absent */
const nonEmpty = z
  .string()
  .optional()
  .transform((val) => (val && val.trim().length > 0 ? val.trim() : undefined));

// ============================================================================
// Graph connection
// ============================================================================

export const GraphConfigSchema = z.object({
  /** Graph API root including the version segment */
  GRAPH_BASE_URL: z.string().url().default('https://graph.microsoft.com/v1.0'),

  /** Token authority for client credentials */
  GRAPH_AUTHORITY_URL: z.string().url().default('https://login.microsoftonline.com'),

  GRAPH_TENANT_ID: nonEmpty,
  GRAPH_CLIENT_ID: nonEmpty,
  GRAPH_CLIENT_SECRET: nonEmpty,

  /** Pre-acquired bearer token; used when client credentials are absent */
  GRAPH_ACCESS_TOKEN: nonEmpty,
});

// ============================================================================
// Sync behaviour
// ============================================================================

export const SyncTuningSchema = z.object({
  /** Delay between successful page requests in ms (0-10000) */
  SYNC_PAGE_DELAY_MS: boundedInt(0, 10_000, 100),

  /** Wait after a throttled response in ms (0-600000) */
  SYNC_THROTTLE_BACKOFF_MS: boundedInt(0, 600_000, 60_000),

  /** Retry ceiling for throttled calls; unbounded when unset */
  SYNC_MAX_THROTTLE_RETRIES: optionalInt(0),

  /** Members per add request; the Graph API refuses more than 20 */
  SYNC_BATCH_SIZE: boundedInt(1, 20, 20),

  /** HTTP request timeout in ms (1000-300000) */
  SYNC_REQUEST_TIMEOUT_MS: boundedInt(1000, 300_000, 30_000),

  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose']).optional(),
});

export const SyncEnvSchema = GraphConfigSchema.merge(SyncTuningSchema);

export type SyncEnvConfig = z.infer<typeof SyncEnvSchema>;

const FIELD_SUGGESTIONS: Record<string, string> = {
  GRAPH_BASE_URL: 'GRAPH_BASE_URL must be an absolute URL such as https://graph.microsoft.com/v1.0',
  GRAPH_AUTHORITY_URL: 'GRAPH_AUTHORITY_URL must be an absolute URL such as https://login.microsoftonline.com',
  SYNC_PAGE_DELAY_MS: 'SYNC_PAGE_DELAY_MS must be between 0 and 10000 ms',
  SYNC_THROTTLE_BACKOFF_MS: 'SYNC_THROTTLE_BACKOFF_MS must be between 0 and 600000 ms',
  SYNC_MAX_THROTTLE_RETRIES: 'SYNC_MAX_THROTTLE_RETRIES must be a non-negative integer, or unset for no limit',
  SYNC_BATCH_SIZE: 'SYNC_BATCH_SIZE must be between 1 and 20',
  SYNC_REQUEST_TIMEOUT_MS: 'SYNC_REQUEST_TIMEOUT_MS must be between 1000 and 300000 ms',
};

// ============================================================================
// Validation Functions
// ============================================================================

export function hasClientCredentials(config: SyncEnvConfig): boolean {
  return Boolean(config.GRAPH_TENANT_ID && config.GRAPH_CLIENT_ID && config.GRAPH_CLIENT_SECRET);
}

/**
 * Validate the full sync configuration, including that some way to
 * authenticate is present
 */
export function validateSyncConfig(env: NodeJS.ProcessEnv): {
  valid: boolean;
  config?: SyncEnvConfig;
  error?: EnvValidationError;
} {
  const result = SyncEnvSchema.safeParse(env);

  if (!result.success) {
    const suggestions: string[] = [];
    for (const issue of result.error.errors) {
      const suggestion = FIELD_SUGGESTIONS[String(issue.path[0])];
      if (suggestion && !suggestions.includes(suggestion)) {
        suggestions.push(suggestion);
      }
    }

    return {
      valid: false,
      error: new EnvValidationError('Invalid sync configuration', result.error.errors, suggestions),
    };
  }

  if (!hasClientCredentials(result.data) && !result.data.GRAPH_ACCESS_TOKEN) {
    return {
      valid: false,
      error: new EnvValidationError(
        'Missing authentication credentials',
        [],
        [
          'Provide client credentials: GRAPH_TENANT_ID, GRAPH_CLIENT_ID and GRAPH_CLIENT_SECRET',
          'Or provide a pre-acquired token in GRAPH_ACCESS_TOKEN',
        ]
      ),
    };
  }

  return { valid: true, config: result.data };
}
