/**
 * PostgreSQL Report Store
 * Persistent storage for discharge reports and their version ledger
 *
 * IMPORTANT: Run db/migrations/001_discharge_reports.sql before using this store.
 *
 * Version numbers are assigned under a row lock on the parent report
 * (`SELECT ... FOR UPDATE`), and UNIQUE (report_id, version_number) backs
 * that up: a duplicate number surfaces as ConcurrencyError, never as a
 * second row.
 */

import {
  ConcurrencyError,
  NotFoundError,
  PG_UNIQUE_VIOLATION,
  getPgConstraint,
  getPgErrorCode,
  toStoreError,
  withTransaction,
  type DatabaseClient,
  type DatabasePool,
  type TransactionClient,
} from '@dischargekit/core';
import {
  ReportContentSchema,
  ReportStatusSchema,
  ReportTypeSchema,
  SpecialtySchema,
  type Report,
  type ReportContent,
  type ReportVersion,
} from '@dischargekit/types';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createEmptyContent } from './report-content.js';
import {
  assertNotCancelled,
  type ReportQuery,
  type ReportRepository,
  type ReportStore,
  type ReportStoreSession,
  type StoreCallOptions,
  type VersionLedger,
} from './report-repository.js';

const VERSION_NUMBER_CONSTRAINT = 'report_versions_report_id_version_number_key';

const REPORT_COLUMNS = `
  r.id, r.hospital_id, r.patient_national_id, r.patient_first_name, r.patient_last_name,
  r.specialty, r.report_type, r.status, r.created_by, r.created_at, r.last_modified,
  r.finalized_at, r.revision, v.content`;

// Current content is the latest ledger entry
const LATEST_CONTENT_JOIN = `
  LEFT JOIN LATERAL (
    SELECT content FROM report_versions
    WHERE report_id = r.id
    ORDER BY version_number DESC
    LIMIT 1
  ) v ON TRUE`;

const VERSION_COLUMNS = 'id, report_id, version_number, content, saved_at, saved_by, comment';

const ReportRowSchema = z.object({
  id: z.string(),
  hospital_id: z.string(),
  patient_national_id: z.string(),
  patient_first_name: z.string(),
  patient_last_name: z.string(),
  specialty: SpecialtySchema,
  report_type: ReportTypeSchema,
  status: ReportStatusSchema,
  created_by: z.string(),
  created_at: z.coerce.date(),
  last_modified: z.coerce.date(),
  finalized_at: z.coerce.date().nullable(),
  revision: z.coerce.number().int(),
  content: ReportContentSchema.nullable(),
});

const VersionRowSchema = z.object({
  id: z.string(),
  report_id: z.string(),
  version_number: z.coerce.number().int(),
  content: ReportContentSchema,
  saved_at: z.coerce.date(),
  saved_by: z.string(),
  comment: z.string(),
});

const RevisionRowSchema = z.object({ revision: z.coerce.number().int() });

function rowToReport(raw: unknown): Report {
  const row = ReportRowSchema.parse(raw);
  return {
    id: row.id,
    hospitalId: row.hospital_id,
    patientNationalId: row.patient_national_id,
    patientFirstName: row.patient_first_name,
    patientLastName: row.patient_last_name,
    specialty: row.specialty,
    reportType: row.report_type,
    status: row.status,
    content: row.content ?? createEmptyContent(),
    createdBy: row.created_by,
    createdAt: row.created_at,
    lastModified: row.last_modified,
    finalizedAt: row.finalized_at,
    revision: row.revision,
  };
}

function rowToVersion(raw: unknown): ReportVersion {
  const row = VersionRowSchema.parse(raw);
  return {
    id: row.id,
    reportId: row.report_id,
    versionNumber: row.version_number,
    content: row.content,
    savedAt: row.saved_at,
    savedBy: row.saved_by,
    comment: row.comment,
  };
}

function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (getPgErrorCode(error) !== PG_UNIQUE_VIOLATION) return false;
  return constraint === undefined || getPgConstraint(error) === constraint;
}

async function run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toStoreError(error, operation);
  }
}

/** Runs ledger work under a transaction, or inside the one already open */
type Atomic = <T>(fn: (tx: TransactionClient) => Promise<T>) => Promise<T>;

class PostgresReportRepository implements ReportRepository {
  constructor(private readonly db: DatabaseClient) {}

  async create(report: Report, options?: StoreCallOptions): Promise<Report> {
    assertNotCancelled('create', options);
    const sql = `
      INSERT INTO reports (
        id, hospital_id, patient_national_id, patient_first_name, patient_last_name,
        specialty, report_type, status, created_by, created_at, last_modified,
        finalized_at, revision
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, 1)
    `;

    try {
      await run('create', () =>
        this.db.query(sql, [
          report.id,
          report.hospitalId,
          report.patientNationalId,
          report.patientFirstName,
          report.patientLastName,
          report.specialty,
          report.reportType,
          report.status,
          report.createdBy,
          report.createdAt,
          report.lastModified,
          report.finalizedAt,
        ])
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConcurrencyError('Report', report.id);
      }
      throw error;
    }
    return { ...report, revision: 1 };
  }

  async findById(id: string, options?: StoreCallOptions): Promise<Report | null> {
    assertNotCancelled('findById', options);
    const result = await run('findById', () =>
      this.db.query(`SELECT ${REPORT_COLUMNS} FROM reports r ${LATEST_CONTENT_JOIN} WHERE r.id = $1`, [id])
    );
    const row = result.rows[0];
    return row ? rowToReport(row) : null;
  }

  async update(report: Report, expectedRevision: number, options?: StoreCallOptions): Promise<Report> {
    assertNotCancelled('update', options);
    const sql = `
      UPDATE reports
      SET status = $1, last_modified = $2, finalized_at = $3, revision = revision + 1
      WHERE id = $4 AND revision = $5
      RETURNING revision
    `;
    const result = await run('update', () =>
      this.db.query(sql, [
        report.status,
        report.lastModified,
        report.finalizedAt,
        report.id,
        expectedRevision,
      ])
    );

    const row = result.rows[0];
    if (!row) {
      return this.explainMissedWrite(report.id);
    }
    return { ...report, revision: RevisionRowSchema.parse(row).revision };
  }

  async delete(id: string, expectedRevision: number, options?: StoreCallOptions): Promise<void> {
    assertNotCancelled('delete', options);
    // report_versions rows go with it (ON DELETE CASCADE)
    const result = await run('delete', () =>
      this.db.query('DELETE FROM reports WHERE id = $1 AND revision = $2', [id, expectedRevision])
    );
    if (result.rowCount === 0) {
      await this.explainMissedWrite(id);
    }
  }

  async list(query: ReportQuery, options?: StoreCallOptions): Promise<Report[]> {
    assertNotCancelled('list', options);
    const params: unknown[] = [query.authorId];
    let where = 'r.created_by = $1';
    if (query.status !== undefined) {
      params.push(query.status);
      where += ` AND r.status = $${params.length}`;
    }
    params.push(query.limit, query.offset);

    const sql = `
      SELECT ${REPORT_COLUMNS} FROM reports r ${LATEST_CONTENT_JOIN}
      WHERE ${where}
      ORDER BY r.last_modified DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}
    `;
    const result = await run('list', () => this.db.query(sql, params));
    return result.rows.map(rowToReport);
  }

  /**
   * A conditional write touched no row: the report is gone or its revision moved on
   */
  private async explainMissedWrite(id: string): Promise<never> {
    const probe = await run('update', () => this.db.query('SELECT 1 FROM reports WHERE id = $1', [id]));
    if (probe.rows.length === 0) {
      throw new NotFoundError(`Report ${id}`);
    }
    throw new ConcurrencyError('Report', id);
  }
}

class PostgresVersionLedger implements VersionLedger {
  constructor(
    private readonly db: DatabaseClient,
    private readonly atomic: Atomic
  ) {}

  async append(
    reportId: string,
    content: ReportContent,
    authorId: string,
    comment: string,
    options?: StoreCallOptions
  ): Promise<ReportVersion> {
    assertNotCancelled('append', options);
    const sql = `
      INSERT INTO report_versions (${VERSION_COLUMNS})
      SELECT $1, $2, COALESCE(MAX(version_number), 0) + 1, $3, $4, $5, $6
      FROM report_versions WHERE report_id = $2
      RETURNING ${VERSION_COLUMNS}
    `;

    try {
      return await run('append', () =>
        this.atomic(async (tx) => {
          const parent = await tx.selectForUpdate('SELECT id FROM reports WHERE id = $1', [reportId]);
          if (parent.rows.length === 0) {
            throw new NotFoundError(`Report ${reportId}`);
          }

          const result = await tx.query(sql, [
            uuidv4(),
            reportId,
            JSON.stringify(content),
            new Date(),
            authorId,
            comment,
          ]);
          const row = result.rows[0];
          if (!row) {
            throw new Error('Failed to append report version: no row returned');
          }
          return rowToVersion(row);
        })
      );
    } catch (error) {
      if (isUniqueViolation(error, VERSION_NUMBER_CONSTRAINT)) {
        throw new ConcurrencyError('ReportVersion', reportId);
      }
      throw error;
    }
  }

  async listVersions(reportId: string, options?: StoreCallOptions): Promise<ReportVersion[]> {
    assertNotCancelled('listVersions', options);
    const result = await run('listVersions', () =>
      this.db.query(
        `SELECT ${VERSION_COLUMNS} FROM report_versions WHERE report_id = $1 ORDER BY version_number DESC`,
        [reportId]
      )
    );
    return result.rows.map(rowToVersion);
  }

  async getVersion(
    reportId: string,
    versionNumber: number,
    options?: StoreCallOptions
  ): Promise<ReportVersion> {
    assertNotCancelled('getVersion', options);
    const result = await run('getVersion', () =>
      this.db.query(
        `SELECT ${VERSION_COLUMNS} FROM report_versions WHERE report_id = $1 AND version_number = $2`,
        [reportId, versionNumber]
      )
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Version ${versionNumber} of report ${reportId}`);
    }
    return rowToVersion(row);
  }

  async latest(reportId: string, options?: StoreCallOptions): Promise<ReportVersion> {
    assertNotCancelled('latest', options);
    const result = await run('latest', () =>
      this.db.query(
        `SELECT ${VERSION_COLUMNS} FROM report_versions WHERE report_id = $1 ORDER BY version_number DESC LIMIT 1`,
        [reportId]
      )
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Versions of report ${reportId}`);
    }
    return rowToVersion(row);
  }
}

export interface PostgresReportStoreOptions {
  pool: DatabasePool;
  /** statement_timeout inside store transactions (default: 30000) */
  statementTimeoutMs?: number;
}

/**
 * @example
 * ```typescript
 * const store = new PostgresReportStore({ pool: createDatabaseClient() });
 * const service = createReportService({ store });
 * ```
 */
export class PostgresReportStore implements ReportStore {
  readonly reports: ReportRepository;
  readonly versions: VersionLedger;

  private readonly pool: DatabasePool;
  private readonly statementTimeoutMs: number | undefined;

  constructor(options: PostgresReportStoreOptions) {
    this.pool = options.pool;
    this.statementTimeoutMs = options.statementTimeoutMs;

    this.reports = new PostgresReportRepository(this.pool);
    this.versions = new PostgresVersionLedger(this.pool, (fn) => this.inTransaction(fn));
  }

  async transaction<T>(
    reportId: string,
    work: (session: ReportStoreSession) => Promise<T>,
    options?: StoreCallOptions
  ): Promise<T> {
    return run('transaction', () =>
      this.inTransaction(async (tx) => {
        assertNotCancelled('transaction', options);
        await tx.selectForUpdate('SELECT id FROM reports WHERE id = $1', [reportId]);

        const result = await work({
          reports: new PostgresReportRepository(tx),
          versions: new PostgresVersionLedger(tx, (fn) => fn(tx)),
        });

        // A cancelled caller must not see its work committed afterwards
        assertNotCancelled('commit', options);
        return result;
      })
    );
  }

  private inTransaction<T>(fn: (tx: TransactionClient) => Promise<T>): Promise<T> {
    return withTransaction(
      this.pool,
      fn,
      this.statementTimeoutMs === undefined ? {} : { timeoutMs: this.statementTimeoutMs }
    );
  }
}
