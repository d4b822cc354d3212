/**
 * Database Client Factory
 * Provides a small database client interface for the report store adapters
 *
 * The pg driver is loaded lazily so that packages using only the in-memory
 * store never need a PostgreSQL connection.
 */

import crypto from 'crypto';
import type { Pool as PgPool } from 'pg';
import { createLogger, type Logger } from './logger/index.js';
import { DatabaseConfigError, StoreUnavailableError } from './errors.js';

/**
 * Database query result type
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Database client interface
 * Compatible with pg.Pool and pg.Client
 */
export interface DatabaseClient {
  query(sql: string, params?: unknown[]): Promise<QueryResult>;
}

/**
 * Database pool interface for connection management
 */
export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

/**
 * Pool client interface (acquired connection)
 */
export interface PoolClient extends DatabaseClient {
  /** Pass an error to destroy the connection instead of returning it to the pool */
  release(err?: Error | boolean): void;
}

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

/**
 * PostgreSQL database pool wrapper
 */
class PostgresPool implements DatabasePool {
  private pool: PgPool | null = null;
  private logger: Logger;

  constructor(private config: DatabaseConfig) {
    this.logger = createLogger({ name: 'database' });
  }

  private async getPool(): Promise<PgPool> {
    if (this.pool) return this.pool;

    const pg = await import('pg');

    // SSL is mandatory outside tests: report content is PHI
    const isProduction = process.env.NODE_ENV === 'production';
    const isTest = process.env.NODE_ENV === 'test';
    const ssl =
      isTest && process.env.DATABASE_SSL !== 'true'
        ? undefined
        : { rejectUnauthorized: isProduction };

    this.logger.info(
      { ssl: ssl !== undefined, rejectUnauthorized: ssl?.rejectUnauthorized },
      'Database SSL configuration'
    );

    const pool = new pg.default.Pool({
      connectionString: this.config.connectionString,
      max: this.config.maxConnections ?? 10,
      idleTimeoutMillis: this.config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: this.config.connectionTimeoutMs ?? 5000,
      ssl,
    });

    pool.on('error', (error) => {
      this.logger.error({ err: error }, 'Idle database client failed');
    });

    this.pool = pool;
    this.logger.info('Database pool initialized');
    return pool;
  }

  async query(sql: string, params?: unknown[]): Promise<QueryResult> {
    const pool = await this.getPool();
    const result = await pool.query(sql, params);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async connect(): Promise<PoolClient> {
    const pool = await this.getPool();
    const client = await pool.connect();

    return {
      query: async (sql: string, params?: unknown[]): Promise<QueryResult> => {
        const result = await client.query(sql, params);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      release: (err?: Error | boolean) => client.release(err),
    };
  }

  async end(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      this.logger.info('Database pool closed');
    }
  }
}

/**
 * Global database pool instance (singleton)
 */
let globalPool: DatabasePool | null = null;

/**
 * Create or get the database client pool
 *
 * @param connectionString - PostgreSQL connection string (defaults to DATABASE_URL)
 *
 * @example
 * ```typescript
 * const db = createDatabaseClient();
 * const store = new PostgresReportStore({ pool: db });
 * ```
 */
export function createDatabaseClient(connectionString?: string): DatabasePool {
  const connString = connectionString ?? process.env.DATABASE_URL;

  if (!connString) {
    throw new DatabaseConfigError(
      'DATABASE_URL must be configured: report data cannot live in volatile memory'
    );
  }

  globalPool ??= new PostgresPool({ connectionString: connString });
  return globalPool;
}

/**
 * Create a new isolated database client (not singleton)
 */
export function createIsolatedDatabaseClient(config: DatabaseConfig): DatabasePool {
  return new PostgresPool(config);
}

/**
 * Close the global database pool
 * Call this during graceful shutdown
 */
export async function closeDatabasePool(): Promise<void> {
  if (globalPool) {
    await globalPool.end();
    globalPool = null;
  }
}

// =============================================================================
// ERROR CLASSIFICATION
// =============================================================================

/**
 * Extract the SQLSTATE code from a driver error
 */
export function getPgErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Extract the violated constraint name from a driver error
 */
export function getPgConstraint(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'constraint' in error) {
    return typeof error.constraint === 'string' ? error.constraint : undefined;
  }
  return undefined;
}

/** unique_violation */
export const PG_UNIQUE_VIOLATION = '23505';

const CONNECTION_FAILURE_CODES = new Set([
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  '57014', // query_canceled (statement_timeout)
  '53300', // too_many_connections
]);

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

/**
 * Whether a driver error means the database is unreachable or overloaded
 */
export function isConnectionFailure(error: unknown): boolean {
  const code = getPgErrorCode(error);
  if (code === undefined) {
    return error instanceof Error && /timeout|terminated|Connection/i.test(error.message);
  }
  return code.startsWith('08') || CONNECTION_FAILURE_CODES.has(code) || NETWORK_ERROR_CODES.has(code);
}

/**
 * Translate a connection-class driver error into a retryable StoreUnavailableError
 * Any other error is returned unchanged
 */
export function toStoreError(error: unknown, operation: string): unknown {
  if (error instanceof StoreUnavailableError || !isConnectionFailure(error)) {
    return error;
  }
  const original = error instanceof Error ? error : undefined;
  return new StoreUnavailableError(operation, original?.message ?? 'database unreachable', original);
}

// =============================================================================
// TRANSACTION MANAGEMENT - ACID Compliance
// =============================================================================

/**
 * Transaction isolation levels
 */
export enum IsolationLevel {
  READ_COMMITTED = 'READ COMMITTED',
  REPEATABLE_READ = 'REPEATABLE READ',
  SERIALIZABLE = 'SERIALIZABLE',
}

/**
 * Transaction configuration options
 */
export interface TransactionOptions {
  /** Isolation level for the transaction */
  isolationLevel?: IsolationLevel;
  /** Statement timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Number of attempts on serialization failures (default: 3) */
  maxRetries?: number;
  /** Base delay for exponential backoff in ms (default: 100) */
  retryBaseDelayMs?: number;
}

/**
 * Transaction client interface with row locking
 */
export interface TransactionClient extends DatabaseClient {
  /**
   * Acquire a row lock using SELECT FOR UPDATE
   * Prevents concurrent modifications to the same row
   */
  selectForUpdate(sql: string, params?: unknown[]): Promise<QueryResult>;
}

/**
 * Error thrown when a transaction cannot be serialized (concurrent conflict)
 */
export class SerializationError extends Error {
  public readonly code = 'SERIALIZATION_FAILURE';
  public readonly isRetryable = true;

  constructor(message: string) {
    super(message);
    this.name = 'SerializationError';
  }
}

/**
 * Error thrown when a deadlock is detected
 */
export class DeadlockError extends Error {
  public readonly code = 'DEADLOCK_DETECTED';
  public readonly isRetryable = true;

  constructor(message: string) {
    super(message);
    this.name = 'DeadlockError';
  }
}

const DEFAULT_TRANSACTION_TIMEOUT = 30000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BASE_DELAY = 100;

/**
 * Execute a function within a database transaction
 *
 * - BEGIN/COMMIT/ROLLBACK management
 * - Configurable isolation level and statement timeout
 * - Retry with exponential backoff on serialization failures and deadlocks
 *
 * @example
 * ```typescript
 * const version = await withTransaction(db, async (tx) => {
 *   await tx.selectForUpdate('SELECT id FROM reports WHERE id = $1', [reportId]);
 *   const { rows } = await tx.query('INSERT INTO report_versions ... RETURNING *', params);
 *   return rows[0];
 * });
 * ```
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  fn: (client: TransactionClient) => Promise<T>,
  options: TransactionOptions = {}
): Promise<T> {
  const {
    isolationLevel = IsolationLevel.READ_COMMITTED,
    timeoutMs = DEFAULT_TRANSACTION_TIMEOUT,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryBaseDelayMs = DEFAULT_RETRY_BASE_DELAY,
  } = options;

  const logger = createLogger({ name: 'transaction' });
  let attempt = 0;

  while (attempt < maxRetries) {
    const client = await pool.connect();
    let broken: Error | undefined;

    try {
      await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}`);
      await client.query(`SET LOCAL statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`);

      const txClient: TransactionClient = {
        query: client.query.bind(client),

        selectForUpdate: async (sql: string, params?: unknown[]): Promise<QueryResult> => {
          const lockingSql = sql.trim().toLowerCase().endsWith('for update')
            ? sql
            : `${sql.trim()} FOR UPDATE`;
          return client.query(lockingSql, params);
        },
      };

      const result = await fn(txClient);

      await client.query('COMMIT');

      return result;
    } catch (error: unknown) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError: unknown) {
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        logger.warn({ err: rollbackError }, 'Rollback failed; connection will be discarded');
      }

      const code = getPgErrorCode(error);
      const isSerializationFailure = code === '40001';
      const isDeadlock = code === '40P01';

      if (isSerializationFailure || isDeadlock) {
        attempt++;

        if (attempt < maxRetries) {
          const randomBytes = new Uint32Array(1);
          crypto.getRandomValues(randomBytes);
          const jitterFactor = 0.5 + ((randomBytes[0] ?? 0) / 0xffffffff) * 0.5;
          const delay = retryBaseDelayMs * Math.pow(2, attempt) * jitterFactor;

          logger.warn(
            { attempt, maxRetries, delay, errorCode: code },
            'Transaction conflict, retrying with backoff'
          );

          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        const message = error instanceof Error ? error.message : String(error);
        if (isSerializationFailure) {
          throw new SerializationError(
            `Transaction serialization failure after ${maxRetries} attempts: ${message}`
          );
        }
        throw new DeadlockError(`Deadlock detected after ${maxRetries} attempts: ${message}`);
      }

      throw error;
    } finally {
      client.release(broken);
    }
  }

  throw new SerializationError('Transaction failed after maximum retries');
}
