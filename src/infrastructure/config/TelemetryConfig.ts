/**
 * @lumberline/core - Telemetry Configuration
 *
 * Validated with zod. Every option has a default, so `resolveConfig({})`
 * yields a working configuration.
 *
 * @module infrastructure/config/TelemetryConfig
 */

import { z } from 'zod';
import { ConfigValidationException } from '../../domain/exceptions/exceptions';
import { Level, parseLevel } from '../../domain/metadata/Level';

// Level given by enum value or by name ("info", "WARNING", ...)
const LevelSetting = z.union([
  z.nativeEnum(Level),
  z.string().transform((text, ctx) => {
    const level = parseLevel(text);
    if (level === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown level "${text}"`,
      });
      return z.NEVER;
    }
    return level;
  }),
]);

export const OverflowPolicySchema = z
  .enum(['block', 'dropNewest', 'dropOldest'])
  .describe('Behaviour of a full export queue');

export const TelemetryConfigSchema = z
  .object({
    queueCapacity: z
      .number()
      .int()
      .positive()
      .default(1024)
      .describe('Maximum records buffered between dispatch and the sink'),
    overflowPolicy: OverflowPolicySchema.default('dropNewest'),
    batchSize: z
      .number()
      .int()
      .positive()
      .default(64)
      .describe('Maximum records per sink write'),
    batchWindowMs: z
      .number()
      .int()
      .nonnegative()
      .default(100)
      .describe('Longest wait for a batch to fill'),
    retryAttempts: z
      .number()
      .int()
      .nonnegative()
      .default(3)
      .describe('Retries of a failed write after the first attempt'),
    retryBackoffMs: z
      .number()
      .nonnegative()
      .default(50)
      .describe('Delay before the first retry; doubles per retry'),
    retryBackoffMaxMs: z
      .number()
      .nonnegative()
      .default(2000)
      .describe('Upper bound of the retry delay'),
    minLevel: LevelSetting.default(Level.Info).describe(
      'Records below this level are filtered out',
    ),
    shutdownTimeoutMs: z
      .number()
      .int()
      .positive()
      .default(5000)
      .describe('Bound on the shutdown drain'),
  })
  .strict()
  .refine((config) => config.retryBackoffMaxMs >= config.retryBackoffMs, {
    message: 'must not be less than retryBackoffMs',
    path: ['retryBackoffMaxMs'],
  });

/** Fully resolved configuration */
export type TelemetryConfig = z.output<typeof TelemetryConfigSchema>;

/** Configuration as accepted from callers; every key optional */
export type TelemetryConfigInput = z.input<typeof TelemetryConfigSchema>;

/**
 * Validate `input` and fill in defaults.
 *
 * @throws ConfigValidationException listing every problem found
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ minLevel: 'debug', batchSize: 16 });
 * config.minLevel; // Level.Debug
 * config.queueCapacity; // 1024
 * ```
 */
export function resolveConfig(input: TelemetryConfigInput = {}): TelemetryConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): TelemetryConfig {
  const result = TelemetryConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationException(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

/**
 * Environment variables read by {@link loadConfigFromEnv}.
 */
export const CONFIG_ENV_VARS = {
  queueCapacity: 'LUMBERLINE_QUEUE_CAPACITY',
  overflowPolicy: 'LUMBERLINE_OVERFLOW_POLICY',
  batchSize: 'LUMBERLINE_BATCH_SIZE',
  batchWindowMs: 'LUMBERLINE_BATCH_WINDOW_MS',
  retryAttempts: 'LUMBERLINE_RETRY_ATTEMPTS',
  retryBackoffMs: 'LUMBERLINE_RETRY_BACKOFF_MS',
  minLevel: 'LUMBERLINE_MIN_LEVEL',
  shutdownTimeoutMs: 'LUMBERLINE_SHUTDOWN_TIMEOUT_MS',
} as const;

type NumericEnvKey = Exclude<
  keyof typeof CONFIG_ENV_VARS,
  'overflowPolicy' | 'minLevel'
>;

const NUMERIC_ENV_KEYS: readonly NumericEnvKey[] = [
  'queueCapacity',
  'batchSize',
  'batchWindowMs',
  'retryAttempts',
  'retryBackoffMs',
  'shutdownTimeoutMs',
];

const POLICY_ALIASES: Record<string, z.infer<typeof OverflowPolicySchema>> = {
  block: 'block',
  dropnewest: 'dropNewest',
  dropoldest: 'dropOldest',
};

/**
 * Build a configuration from environment variables.
 *
 * Unset or empty variables fall back to defaults. Policy names are
 * matched ignoring case, `-` and `_` (`drop-oldest` works).
 *
 * @throws ConfigValidationException when a variable holds an invalid value
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): TelemetryConfig {
  const input: Record<string, unknown> = {};

  for (const key of NUMERIC_ENV_KEYS) {
    const raw = env[CONFIG_ENV_VARS[key]]?.trim();
    if (raw) input[key] = Number(raw);
  }

  const policy = env[CONFIG_ENV_VARS.overflowPolicy]?.trim();
  if (policy) {
    input.overflowPolicy =
      POLICY_ALIASES[policy.toLowerCase().replace(/[-_]/g, '')] ?? policy;
  }

  const level = env[CONFIG_ENV_VARS.minLevel]?.trim();
  if (level) input.minLevel = level;

  return parseConfig(input);
}
