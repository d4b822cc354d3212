import { z } from 'zod';

/**
 * Environment Variable Validation
 * Validates report core settings once at boot time
 */

const nonNegativeInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : fallback))
    .pipe(z.number().int().nonnegative());

// Base runtime config
const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
});

// Report store call budget
const ReportStoreEnvSchema = z.object({
  /** Deadline for every report store interaction */
  REPORT_STORE_TIMEOUT_MS: nonNegativeInt(5000),
  /** Retries for StoreUnavailable failures before surfacing to the request */
  REPORT_STORE_MAX_RETRIES: nonNegativeInt(3),
  /** Base delay for exponential backoff between retries */
  REPORT_STORE_RETRY_BASE_DELAY_MS: nonNegativeInt(100),
});

export const ReportCoreEnvSchema =
  RuntimeEnvSchema.merge(DatabaseEnvSchema).merge(ReportStoreEnvSchema);

export type ReportCoreEnv = z.infer<typeof ReportCoreEnvSchema>;

/**
 * Settings consumed by the report service
 */
export interface ReportStoreSettings {
  storeTimeoutMs: number;
  storeMaxRetries: number;
  storeRetryBaseDelayMs: number;
}

export interface ReportCoreConfig extends ReportStoreSettings {
  nodeEnv: ReportCoreEnv['NODE_ENV'];
  logLevel: ReportCoreEnv['LOG_LEVEL'];
  databaseUrl: string | undefined;
}

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): ReportCoreEnv {
  const result = ReportCoreEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errorMessages}`);
  }

  return result.data;
}

/**
 * Load the report core configuration from the environment
 */
export function loadReportCoreConfig(env: NodeJS.ProcessEnv = process.env): ReportCoreConfig {
  const parsed = validateEnv(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    databaseUrl: parsed.DATABASE_URL,
    storeTimeoutMs: parsed.REPORT_STORE_TIMEOUT_MS,
    storeMaxRetries: parsed.REPORT_STORE_MAX_RETRIES,
    storeRetryBaseDelayMs: parsed.REPORT_STORE_RETRY_BASE_DELAY_MS,
  };
}

