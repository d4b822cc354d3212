/**
 * Report Store Interfaces (Ports)
 *
 * HEXAGONAL ARCHITECTURE:
 * - These are PORTS in the domain layer
 * - Adapters: InMemoryReportStore (tests/development), PostgresReportStore
 * - The service only depends on these contracts
 *
 * Each report together with its ledger is one unit of consistency; a
 * transaction never spans two reports.
 *
 * @module domain/discharge-reports/report-repository
 */

import { StoreUnavailableError } from '@dischargekit/core';
import type {
  Report,
  ReportContent,
  ReportStatus,
  ReportVersion,
} from '@dischargekit/types';

/**
 * Per-call options carried to every store operation
 */
export interface StoreCallOptions {
  /** Caller cancellation */
  signal?: AbortSignal | undefined;
}

/**
 * Adapters call this before each statement and before committing
 *
 * @throws {StoreUnavailableError} once the caller's signal has fired
 */
export function assertNotCancelled(operation: string, options?: StoreCallOptions): void {
  if (options?.signal?.aborted) {
    throw new StoreUnavailableError(operation, 'call was cancelled');
  }
}

/**
 * Query for {@link ReportRepository.list}
 */
export interface ReportQuery {
  authorId: string;
  status?: ReportStatus | undefined;
  limit: number;
  offset: number;
}

/**
 * Repository for the report row
 *
 * Writes are conditioned on the `revision` read alongside the report; a
 * mismatch throws ConcurrencyError and leaves the row untouched.
 */
export interface ReportRepository {
  /**
   * Insert a new report row
   */
  create(report: Report, options?: StoreCallOptions): Promise<Report>;

  /**
   * Find a report, with `content` materialized from its latest version
   */
  findById(id: string, options?: StoreCallOptions): Promise<Report | null>;

  /**
   * Conditionally write status, timestamps and `finalizedAt`
   * Returns the stored report with its revision incremented
   *
   * @throws {ConcurrencyError} when the stored revision differs from expectedRevision
   */
  update(report: Report, expectedRevision: number, options?: StoreCallOptions): Promise<Report>;

  /**
   * Conditionally delete a report and cascade its versions
   *
   * @throws {ConcurrencyError} when the stored revision differs from expectedRevision
   */
  delete(id: string, expectedRevision: number, options?: StoreCallOptions): Promise<void>;

  /**
   * Reports created by an author, most recently modified first
   */
  list(query: ReportQuery, options?: StoreCallOptions): Promise<Report[]>;
}

/**
 * Append-only ledger of immutable content snapshots
 */
export interface VersionLedger {
  /**
   * Append the next sequential version for a report
   * The number is assigned atomically with respect to concurrent appends
   */
  append(
    reportId: string,
    content: ReportContent,
    authorId: string,
    comment: string,
    options?: StoreCallOptions
  ): Promise<ReportVersion>;

  /**
   * All versions of a report, newest first
   */
  listVersions(reportId: string, options?: StoreCallOptions): Promise<ReportVersion[]>;

  /**
   * @throws {NotFoundError} when the version does not exist
   */
  getVersion(
    reportId: string,
    versionNumber: number,
    options?: StoreCallOptions
  ): Promise<ReportVersion>;

  /**
   * The current (highest-numbered) version
   *
   * @throws {NotFoundError} when the report has no versions
   */
  latest(reportId: string, options?: StoreCallOptions): Promise<ReportVersion>;
}

/**
 * Repository and ledger bound to the same transaction
 */
export interface ReportStoreSession {
  readonly reports: ReportRepository;
  readonly versions: VersionLedger;
}

/**
 * Durable store for reports and their ledgers
 *
 * @example
 * ```typescript
 * const version = await store.transaction(report.id, async ({ reports, versions }) => {
 *   await reports.update(next, report.revision);
 *   return versions.append(report.id, content, editorId, 'Auto-save');
 * });
 * ```
 */
export interface ReportStore extends ReportStoreSession {
  /**
   * Run work atomically for one report: every repository and ledger call made
   * through the session commits together or not at all
   */
  transaction<T>(
    reportId: string,
    work: (session: ReportStoreSession) => Promise<T>,
    options?: StoreCallOptions
  ): Promise<T>;
}
