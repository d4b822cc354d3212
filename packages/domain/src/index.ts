/**
 * @fileoverview Domain Package Exports
 *
 * Central export point for the discharge report domain.
 *
 * @module @dischargekit/domain
 *
 * ## Architecture Overview
 *
 * - **Workflow engine**: the status transition table and its predicates
 * - **Content validator**: structural parsing and completeness rules
 * - **Report aggregate**: pure state changes of a report
 * - **Ports**: ReportRepository, VersionLedger and the transactional ReportStore
 * - **Adapters**: InMemoryReportStore, PostgresReportStore
 * - **ReportService**: lifecycle orchestration with timeouts and retries
 *
 * @example
 * ```typescript
 * import { InMemoryReportStore, createReportService } from '@dischargekit/domain';
 *
 * const service = createReportService({ store: new InMemoryReportStore() });
 * const report = await service.create({ ... });
 * ```
 */

export * from './discharge-reports/index.js';
