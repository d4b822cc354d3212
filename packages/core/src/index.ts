/**
 * @module @dischargekit/core
 * @description Shared infrastructure for the discharge report core
 *
 * Exports:
 * - Medical-grade logger with PHI redaction
 * - Error taxonomy for the report lifecycle
 * - Environment configuration
 * - PostgreSQL pool and transaction helpers
 * - Retry and timeout utilities
 */
export {
  createLogger,
  createChildLogger,
  withCorrelation,
  generateCorrelationId,
  safeLog,
  logger,
  REDACTION_PATHS,
  PII_PATTERNS,
  redactString,
  deepRedactObject,
  shouldRedactPath,
  maskName,
  maskNationalId,
  type Logger,
  type LoggerConfig,
  type LogContext,
} from './logger/index.js';

export {
  AppError,
  ValidationError,
  NotFoundError,
  InvalidPatientIdError,
  EditNotAllowedError,
  InvalidTransitionError,
  IncompleteContentError,
  ConcurrencyError,
  StoreUnavailableError,
  DatabaseConfigError,
  isOperationalError,
  isRetryableError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export {
  withRetry,
  withTimeout,
  sleep,
  isDefined,
  type RetryOptions,
  type TimeoutOptions,
} from './utils.js';

export {
  ReportCoreEnvSchema,
  validateEnv,
  loadReportCoreConfig,
  type ReportCoreEnv,
  type ReportCoreConfig,
  type ReportStoreSettings,
} from './env.js';

export {
  createDatabaseClient,
  createIsolatedDatabaseClient,
  closeDatabasePool,
  withTransaction,
  getPgErrorCode,
  getPgConstraint,
  isConnectionFailure,
  toStoreError,
  PG_UNIQUE_VIOLATION,
  IsolationLevel,
  SerializationError,
  DeadlockError,
  type QueryResult,
  type DatabaseClient,
  type DatabasePool,
  type PoolClient,
  type DatabaseConfig,
  type TransactionOptions,
  type TransactionClient,
} from './database.js';
