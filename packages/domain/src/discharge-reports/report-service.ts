/**
 * Discharge Report Service
 * Orchestrates the report lifecycle: drafting, versioned saves, workflow
 * transitions, restores and deletion
 *
 * IMPORTANT: Use with a persistent store (PostgresReportStore) in production.
 * The in-memory store is only for development/testing.
 *
 * Every store interaction is bounded by `storeTimeoutMs` and the caller's
 * AbortSignal, and StoreUnavailableError is retried with exponential backoff.
 * ConcurrencyError is never retried here: the caller re-reads and decides.
 */

import {
  IncompleteContentError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
  createLogger,
  withRetry,
  withTimeout,
  type Logger,
  type ReportStoreSettings,
} from '@dischargekit/core';
import {
  CreateReportInputSchema,
  ReportListQuerySchema,
  UUIDSchema,
  type CreateReportInput,
  type Report,
  type ReportContentInput,
  type ReportListQuery,
  type ReportStatus,
  type ReportVersion,
} from '@dischargekit/types';
import { InMemoryReportStore } from './in-memory-report-store.js';
import { parseReportContent, validateContent } from './report-content.js';
import {
  AUTO_SAVE_COMMENT,
  INITIAL_VERSION_COMMENT,
  assertEditable,
  createReport,
  restoredVersionComment,
  withContent,
  withStatus,
} from './report.js';
import type { ReportStore, StoreCallOptions } from './report-repository.js';
import { assertTransition, requiresCompleteContent } from './report-workflow.js';

/**
 * Options accepted by every service operation
 */
export interface ReportCallOptions {
  /** Cancels the in-flight store call; surfaces as StoreUnavailableError */
  signal?: AbortSignal | undefined;
}

export const DEFAULT_STORE_SETTINGS: ReportStoreSettings = {
  storeTimeoutMs: 5000,
  storeMaxRetries: 3,
  storeRetryBaseDelayMs: 100,
};

export const DEFAULT_LIST_LIMIT = 20;
export const MAX_LIST_LIMIT = 100;

export interface ReportServiceOptions {
  store?: ReportStore;
  config?: Partial<ReportStoreSettings>;
  logger?: Logger;
  /**
   * Whether the application is running in production mode.
   * When true, a persistent store is required.
   */
  isProduction?: boolean;
}

export class ReportService {
  private readonly store: ReportStore;
  private readonly settings: ReportStoreSettings;
  private readonly logger: Logger;

  constructor(options: ReportServiceOptions = {}) {
    this.settings = { ...DEFAULT_STORE_SETTINGS, ...options.config };
    this.logger = options.logger ?? createLogger({ name: 'report-service' });

    if (options.store) {
      this.store = options.store;
    } else {
      // Report content is PHI: it must survive restarts
      if (options.isProduction) {
        const errorMessage =
          'ReportService requires a persistent store in production. ' +
          'Please configure PostgresReportStore.';
        this.logger.fatal(errorMessage);
        throw new Error(errorMessage);
      }
      this.logger.warn(
        'ReportService initialized with in-memory store. ' +
          'This is NOT suitable for production - reports will be lost on restart!'
      );
      this.store = new InMemoryReportStore();
    }
  }

  /**
   * Create a draft report with empty content and version 1
   */
  async create(input: CreateReportInput, options?: ReportCallOptions): Promise<Report> {
    const parsed = CreateReportInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid report input', parsed.error.flatten());
    }

    const report = createReport(parsed.data);

    const created = await this.call('create', options, (opts) =>
      this.store.transaction(
        report.id,
        async ({ reports, versions }) => {
          const stored = await reports.create(report, opts);
          await versions.append(report.id, report.content, report.createdBy, INITIAL_VERSION_COMMENT, opts);
          return stored;
        },
        opts
      )
    );

    this.logger.info(
      { reportId: created.id, hospitalId: created.hospitalId, versionNumber: 1 },
      'Discharge report created'
    );
    return created;
  }

  /**
   * Save new content for a draft, appending the next version
   */
  async updateContent(
    reportId: string,
    newContent: ReportContentInput,
    editorId: string,
    options?: ReportCallOptions
  ): Promise<Report> {
    const current = await this.requireReport(reportId, options);
    assertEditable(current);
    const content = parseReportContent(newContent);

    const next = withContent(current, content);
    const { report, version } = await this.call('updateContent', options, (opts) =>
      this.store.transaction(
        reportId,
        async ({ reports, versions }) => {
          const updated = await reports.update(next, current.revision, opts);
          const appended = await versions.append(reportId, content, editorId, AUTO_SAVE_COMMENT, opts);
          return { report: updated, version: appended };
        },
        opts
      )
    );

    this.logger.info(
      { reportId, versionNumber: version.versionNumber, revision: report.revision },
      'Report content saved'
    );
    return { ...report, content: version.content };
  }

  /**
   * Move a report through the workflow; never appends a version
   */
  async changeStatus(
    reportId: string,
    targetStatus: ReportStatus,
    options?: ReportCallOptions
  ): Promise<Report> {
    const current = await this.requireReport(reportId, options);
    assertTransition(current.status, targetStatus);

    if (requiresCompleteContent(current.status, targetStatus)) {
      const outcome = validateContent(current.content);
      if (!outcome.valid) {
        throw new IncompleteContentError(reportId, outcome.violations);
      }
    }

    const next = withStatus(current, targetStatus);
    const updated = await this.call('changeStatus', options, (opts) =>
      this.store.reports.update(next, current.revision, opts)
    );

    this.logger.info(
      { reportId, from: current.status, to: updated.status, revision: updated.revision },
      'Report status changed'
    );
    return updated;
  }

  /**
   * Make a historical version current again by appending a copy of it
   */
  async restoreVersion(
    reportId: string,
    versionNumber: number,
    editorId: string,
    options?: ReportCallOptions
  ): Promise<Report> {
    const current = await this.requireReport(reportId, options);
    assertEditable(current);
    assertVersionNumber(reportId, versionNumber);

    const source = await this.call('getVersion', options, (opts) =>
      this.store.versions.getVersion(reportId, versionNumber, opts)
    );

    const next = withContent(current, source.content);
    const { report, version } = await this.call('restoreVersion', options, (opts) =>
      this.store.transaction(
        reportId,
        async ({ reports, versions }) => {
          const updated = await reports.update(next, current.revision, opts);
          const appended = await versions.append(
            reportId,
            source.content,
            editorId,
            restoredVersionComment(versionNumber),
            opts
          );
          return { report: updated, version: appended };
        },
        opts
      )
    );

    this.logger.info(
      { reportId, restoredFrom: versionNumber, versionNumber: version.versionNumber },
      'Report version restored'
    );
    return { ...report, content: version.content };
  }

  /**
   * Hard-delete a draft together with its versions
   */
  async delete(reportId: string, options?: ReportCallOptions): Promise<void> {
    const current = await this.requireReport(reportId, options);
    assertEditable(current);

    await this.call('delete', options, (opts) =>
      this.store.reports.delete(reportId, current.revision, opts)
    );

    this.logger.info({ reportId }, 'Discharge report deleted');
  }

  async getReport(reportId: string, options?: ReportCallOptions): Promise<Report> {
    return this.requireReport(reportId, options);
  }

  /**
   * Version history, newest first
   */
  async listVersions(reportId: string, options?: ReportCallOptions): Promise<ReportVersion[]> {
    await this.requireReport(reportId, options);
    return this.call('listVersions', options, (opts) =>
      this.store.versions.listVersions(reportId, opts)
    );
  }

  async getVersion(
    reportId: string,
    versionNumber: number,
    options?: ReportCallOptions
  ): Promise<ReportVersion> {
    await this.requireReport(reportId, options);
    assertVersionNumber(reportId, versionNumber);
    return this.call('getVersion', options, (opts) =>
      this.store.versions.getVersion(reportId, versionNumber, opts)
    );
  }

  /**
   * Reports created by an author, most recently modified first
   */
  async listReports(query: ReportListQuery, options?: ReportCallOptions): Promise<Report[]> {
    const parsed = ReportListQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new ValidationError('Invalid report query', parsed.error.flatten());
    }

    const { authorId, status, limit, offset } = parsed.data;
    return this.call('listReports', options, (opts) =>
      this.store.reports.list(
        {
          authorId,
          status,
          limit:
            limit === undefined || limit <= 0 ? DEFAULT_LIST_LIMIT : Math.min(limit, MAX_LIST_LIMIT),
          offset: Math.max(0, offset ?? 0),
        },
        opts
      )
    );
  }

  private async requireReport(reportId: string, options?: ReportCallOptions): Promise<Report> {
    // Ids are UUIDs; anything else cannot match a row
    if (!UUIDSchema.safeParse(reportId).success) {
      throw new NotFoundError(`Report ${reportId}`);
    }
    const report = await this.call('findById', options, (opts) =>
      this.store.reports.findById(reportId, opts)
    );
    if (!report) {
      throw new NotFoundError(`Report ${reportId}`);
    }
    return report;
  }

  /**
   * Run one store interaction under the deadline, the caller's signal and the retry policy
   *
   * Each attempt gets its own AbortController, aborted on timeout or caller
   * abort, so an abandoned attempt never commits after the caller moved on.
   */
  private call<T>(
    operation: string,
    options: ReportCallOptions | undefined,
    fn: (opts: StoreCallOptions) => Promise<T>
  ): Promise<T> {
    const callerSignal = options?.signal;
    const { storeTimeoutMs, storeMaxRetries, storeRetryBaseDelayMs } = this.settings;

    return withRetry(
      () => {
        const attempt = new AbortController();
        return withTimeout(() => fn({ signal: attempt.signal }), {
          timeoutMs: storeTimeoutMs,
          signal: callerSignal,
          onTimeout: (reason) => {
            attempt.abort();
            return new StoreUnavailableError(
              operation,
              reason === 'timeout' ? `timed out after ${storeTimeoutMs}ms` : 'call was cancelled'
            );
          },
        });
      },
      {
        maxRetries: storeMaxRetries,
        baseDelayMs: storeRetryBaseDelayMs,
        shouldRetry: (error) => error instanceof StoreUnavailableError && !callerSignal?.aborted,
        onRetry: (_error, attempt, delayMs) => {
          this.logger.warn(
            { operation, attempt: attempt + 1, maxRetries: storeMaxRetries, delayMs },
            'Report store unavailable, retrying'
          );
        },
      }
    );
  }
}

function assertVersionNumber(reportId: string, versionNumber: number): void {
  if (!Number.isInteger(versionNumber) || versionNumber < 1) {
    throw new NotFoundError(`Version ${versionNumber} of report ${reportId}`);
  }
}

/**
 * Factory function for creating a report service
 */
export function createReportService(options?: ReportServiceOptions): ReportService {
  return new ReportService(options);
}
