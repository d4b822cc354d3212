/**
 * In-Memory Report Store
 *
 * Test/development adapter for the report store ports.
 *
 * WARNING: Not suitable for production - data is lost on restart.
 * For production, use PostgresReportStore.
 *
 * It mirrors the PostgreSQL adapter's guarantees so that tests catch
 * concurrency issues during development:
 * - transactions are serialized per report (the row lock) and staged on a
 *   private copy that is only published on commit
 * - version numbers are unique per report (the UNIQUE constraint)
 * - report writes are conditioned on the revision token
 *
 * Every operation yields to the event loop before touching state, so
 * concurrent callers interleave the way they would against a real database.
 *
 * @module domain/discharge-reports/in-memory-report-store
 */

import { ConcurrencyError, NotFoundError } from '@dischargekit/core';
import type { Report, ReportContent, ReportVersion } from '@dischargekit/types';
import { createEmptyContent } from './report-content.js';
import { createVersion } from './report.js';
import {
  assertNotCancelled,
  type ReportQuery,
  type ReportRepository,
  type ReportStore,
  type ReportStoreSession,
  type StoreCallOptions,
  type VersionLedger,
} from './report-repository.js';

type ReportRow = Omit<Report, 'content'>;

interface StoredReport {
  row: ReportRow;
  versions: ReportVersion[];
}

/**
 * Access to stored records; either the committed table or a transaction's staged view
 */
interface RecordAccess {
  get(reportId: string): StoredReport | undefined;
  put(record: StoredReport): void;
  remove(reportId: string): void;
  all(): StoredReport[];
}

function cloneRecord(record: StoredReport): StoredReport {
  return { row: { ...record.row }, versions: [...record.versions] };
}

function toReport(record: StoredReport): Report {
  const current = record.versions[record.versions.length - 1];
  return { ...record.row, content: current ? current.content : createEmptyContent() };
}

async function checkpoint(operation: string, options?: StoreCallOptions): Promise<void> {
  await Promise.resolve();
  assertNotCancelled(operation, options);
}

class CommittedRecords implements RecordAccess {
  private records = new Map<string, StoredReport>();

  get(reportId: string): StoredReport | undefined {
    const record = this.records.get(reportId);
    return record ? cloneRecord(record) : undefined;
  }

  put(record: StoredReport): void {
    this.records.set(record.row.id, cloneRecord(record));
  }

  remove(reportId: string): void {
    this.records.delete(reportId);
  }

  all(): StoredReport[] {
    return Array.from(this.records.values(), cloneRecord);
  }

  clear(): void {
    this.records.clear();
  }
}

/**
 * Staged view of a single report for the duration of a transaction
 */
class StagedRecords implements RecordAccess {
  private staged: StoredReport | undefined;

  constructor(
    private readonly base: CommittedRecords,
    private readonly reportId: string
  ) {
    this.staged = base.get(reportId);
  }

  private assertScope(reportId: string): void {
    if (reportId !== this.reportId) {
      throw new Error(
        `Transaction for report ${this.reportId} cannot access report ${reportId}`
      );
    }
  }

  get(reportId: string): StoredReport | undefined {
    this.assertScope(reportId);
    return this.staged ? cloneRecord(this.staged) : undefined;
  }

  put(record: StoredReport): void {
    this.assertScope(record.row.id);
    this.staged = cloneRecord(record);
  }

  remove(reportId: string): void {
    this.assertScope(reportId);
    this.staged = undefined;
  }

  all(): StoredReport[] {
    const others = this.base.all().filter((record) => record.row.id !== this.reportId);
    return this.staged ? [...others, cloneRecord(this.staged)] : others;
  }

  commit(): void {
    if (this.staged) {
      this.base.put(this.staged);
    } else {
      this.base.remove(this.reportId);
    }
  }
}

class InMemoryReportRepository implements ReportRepository {
  constructor(private readonly records: RecordAccess) {}

  async create(report: Report, options?: StoreCallOptions): Promise<Report> {
    await checkpoint('create', options);
    if (this.records.get(report.id)) {
      throw new ConcurrencyError('Report', report.id);
    }
    const { content: _content, ...row } = report;
    this.records.put({ row: { ...row, revision: 1 }, versions: [] });
    return { ...report, revision: 1 };
  }

  async findById(id: string, options?: StoreCallOptions): Promise<Report | null> {
    await checkpoint('findById', options);
    const record = this.records.get(id);
    return record ? toReport(record) : null;
  }

  async update(report: Report, expectedRevision: number, options?: StoreCallOptions): Promise<Report> {
    await checkpoint('update', options);
    const record = this.records.get(report.id);
    if (!record) {
      throw new NotFoundError(`Report ${report.id}`);
    }
    if (record.row.revision !== expectedRevision) {
      throw new ConcurrencyError('Report', report.id);
    }

    const row: ReportRow = {
      ...record.row,
      status: report.status,
      lastModified: report.lastModified,
      finalizedAt: report.finalizedAt,
      revision: record.row.revision + 1,
    };
    this.records.put({ row, versions: record.versions });
    return toReport({ row, versions: record.versions });
  }

  async delete(id: string, expectedRevision: number, options?: StoreCallOptions): Promise<void> {
    await checkpoint('delete', options);
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(`Report ${id}`);
    }
    if (record.row.revision !== expectedRevision) {
      throw new ConcurrencyError('Report', id);
    }
    // Versions are stored with the report, so they go with it
    this.records.remove(id);
  }

  async list(query: ReportQuery, options?: StoreCallOptions): Promise<Report[]> {
    await checkpoint('list', options);
    return this.records
      .all()
      .filter(
        (record) =>
          record.row.createdBy === query.authorId &&
          (query.status === undefined || record.row.status === query.status)
      )
      .sort((a, b) => b.row.lastModified.getTime() - a.row.lastModified.getTime())
      .slice(query.offset, query.offset + query.limit)
      .map(toReport);
  }
}

class InMemoryVersionLedger implements VersionLedger {
  constructor(private readonly records: RecordAccess) {}

  async append(
    reportId: string,
    content: ReportContent,
    authorId: string,
    comment: string,
    options?: StoreCallOptions
  ): Promise<ReportVersion> {
    await checkpoint('append', options);
    const record = this.records.get(reportId);
    if (!record) {
      throw new NotFoundError(`Report ${reportId}`);
    }

    const last = record.versions[record.versions.length - 1];
    const versionNumber = (last?.versionNumber ?? 0) + 1;

    // Mirrors UNIQUE (report_id, version_number)
    if (record.versions.some((version) => version.versionNumber === versionNumber)) {
      throw new ConcurrencyError('ReportVersion', `${reportId}#${versionNumber}`);
    }

    const version = Object.freeze(
      createVersion(reportId, versionNumber, structuredClone(content), authorId, comment)
    );
    this.records.put({ row: record.row, versions: [...record.versions, version] });
    return version;
  }

  async listVersions(reportId: string, options?: StoreCallOptions): Promise<ReportVersion[]> {
    await checkpoint('listVersions', options);
    const record = this.records.get(reportId);
    return record ? [...record.versions].reverse() : [];
  }

  async getVersion(
    reportId: string,
    versionNumber: number,
    options?: StoreCallOptions
  ): Promise<ReportVersion> {
    await checkpoint('getVersion', options);
    const version = this.records
      .get(reportId)
      ?.versions.find((candidate) => candidate.versionNumber === versionNumber);
    if (!version) {
      throw new NotFoundError(`Version ${versionNumber} of report ${reportId}`);
    }
    return version;
  }

  async latest(reportId: string, options?: StoreCallOptions): Promise<ReportVersion> {
    await checkpoint('latest', options);
    const versions = this.records.get(reportId)?.versions ?? [];
    const current = versions[versions.length - 1];
    if (!current) {
      throw new NotFoundError(`Versions of report ${reportId}`);
    }
    return current;
  }
}

/**
 * In-memory implementation for development/testing
 *
 * @example
 * ```typescript
 * const store = new InMemoryReportStore();
 * const service = createReportService({ store });
 * ```
 */
export class InMemoryReportStore implements ReportStore {
  private readonly committed = new CommittedRecords();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly direct: ReportStoreSession;

  readonly reports: ReportRepository;
  readonly versions: VersionLedger;

  constructor() {
    this.direct = {
      reports: new InMemoryReportRepository(this.committed),
      versions: new InMemoryVersionLedger(this.committed),
    };

    // Reads go straight to committed state; writes run as single-statement transactions
    this.reports = {
      create: (report, options) =>
        this.transaction(report.id, (s) => s.reports.create(report, options), options),
      findById: (id, options) => this.direct.reports.findById(id, options),
      update: (report, expectedRevision, options) =>
        this.transaction(report.id, (s) => s.reports.update(report, expectedRevision, options), options),
      delete: (id, expectedRevision, options) =>
        this.transaction(id, (s) => s.reports.delete(id, expectedRevision, options), options),
      list: (query, options) => this.direct.reports.list(query, options),
    };

    this.versions = {
      append: (reportId, content, authorId, comment, options) =>
        this.transaction(
          reportId,
          (s) => s.versions.append(reportId, content, authorId, comment, options),
          options
        ),
      listVersions: (reportId, options) => this.direct.versions.listVersions(reportId, options),
      getVersion: (reportId, versionNumber, options) =>
        this.direct.versions.getVersion(reportId, versionNumber, options),
      latest: (reportId, options) => this.direct.versions.latest(reportId, options),
    };
  }

  /**
   * Serialize transactions per report; state is published only on commit.
   * Do not open a nested transaction for the same report from inside `work`.
   */
  async transaction<T>(
    reportId: string,
    work: (session: ReportStoreSession) => Promise<T>,
    options?: StoreCallOptions
  ): Promise<T> {
    const release = await this.acquire(reportId);
    try {
      await checkpoint('transaction', options);
      const staged = new StagedRecords(this.committed, reportId);
      const result = await work({
        reports: new InMemoryReportRepository(staged),
        versions: new InMemoryVersionLedger(staged),
      });
      // A cancelled caller must not see its work committed afterwards
      await checkpoint('commit', options);
      staged.commit();
      return result;
    } finally {
      release();
    }
  }

  private async acquire(reportId: string): Promise<() => void> {
    const previous = this.locks.get(reportId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(reportId, tail);

    await previous;

    return () => {
      release();
      if (this.locks.get(reportId) === tail) {
        this.locks.delete(reportId);
      }
    };
  }

  // For testing
  size(): number {
    return this.committed.all().length;
  }

  clear(): void {
    this.committed.clear();
    this.locks.clear();
  }
}
