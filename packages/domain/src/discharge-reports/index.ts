/**
 * Discharge Reports Module (Domain Layer)
 *
 * Lifecycle of hospital discharge reports: versioned drafting, review
 * workflow and finalization.
 *
 * ## Hexagonal Architecture
 *
 * This module exports:
 * - ReportService: Domain service orchestrating the lifecycle
 * - ReportStore, ReportRepository, VersionLedger: Port interfaces for persistence
 * - PostgresReportStore: Production-grade PostgreSQL adapter
 * - InMemoryReportStore: Test/development adapter
 *
 * @example
 * ```typescript
 * import { PostgresReportStore, createReportService } from '@dischargekit/domain';
 * import { createDatabaseClient, loadReportCoreConfig } from '@dischargekit/core';
 *
 * const config = loadReportCoreConfig();
 * const store = new PostgresReportStore({ pool: createDatabaseClient(config.databaseUrl) });
 * const reports = createReportService({ store, config, isProduction: config.nodeEnv === 'production' });
 * ```
 *
 * @module domain/discharge-reports
 */

export * from './report-workflow.js';
export * from './report-content.js';
export * from './report.js';
export * from './report-repository.js';
export * from './in-memory-report-store.js';
export * from './postgres-report-store.js';
export * from './report-service.js';
