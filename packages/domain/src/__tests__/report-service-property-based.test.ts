import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  EditNotAllowedError,
  IncompleteContentError,
  InvalidTransitionError,
  NotFoundError,
  createLogger,
} from '@dischargekit/core';
import { REPORT_STATUSES, type ReportContentInput, type ReportStatus } from '@dischargekit/types';
import { InMemoryReportStore } from '../discharge-reports/in-memory-report-store.js';
import { ReportService } from '../discharge-reports/report-service.js';
import { canTransition, isFinalizedStatus } from '../discharge-reports/report-workflow.js';
import { TEST_AUTHOR_ID, createCompleteContent, createTestReportInput } from './report-fixtures.js';

/**
 * Property-Based Tests for the Report Service
 *
 * Random sequences of saves, restores and status changes are replayed against
 * a fresh store. Rejected operations are allowed; what must hold afterwards:
 * 1. Version numbers are contiguous from 1, newest first
 * 2. The report's content is the latest version's content
 * 3. Every accepted operation bumped the revision exactly once
 * 4. finalizedAt is set exactly in the finalized statuses
 */

type Operation =
  | { kind: 'save'; complete: boolean; complaint: string }
  | { kind: 'restore'; versionNumber: number }
  | { kind: 'status'; to: ReportStatus };

const operationArb: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({
    kind: fc.constant('save' as const),
    complete: fc.boolean(),
    complaint: fc.string({ minLength: 1, maxLength: 20 }),
  }),
  fc.record({
    kind: fc.constant('restore' as const),
    versionNumber: fc.integer({ min: 1, max: 8 }),
  }),
  fc.record({
    kind: fc.constant('status' as const),
    to: fc.constantFrom(...REPORT_STATUSES),
  })
);

function contentFor(complete: boolean, complaint: string): ReportContentInput {
  if (!complete) {
    return { anamnesis: { chiefComplaint: complaint } };
  }
  const content = createCompleteContent();
  return { ...content, anamnesis: { chiefComplaint: complaint } };
}

function isLifecycleRejection(error: unknown): boolean {
  return (
    error instanceof EditNotAllowedError ||
    error instanceof InvalidTransitionError ||
    error instanceof IncompleteContentError ||
    error instanceof NotFoundError
  );
}

describe('Report service properties', () => {
  it('should keep the ledger and revision consistent under any operation sequence', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(operationArb, { maxLength: 15 }), async (operations) => {
        const service = new ReportService({
          store: new InMemoryReportStore(),
          logger: createLogger({ level: 'silent' }),
        });
        const created = await service.create(createTestReportInput());

        let accepted = 0;
        let appended = 1;

        for (const operation of operations) {
          const before = await service.getReport(created.id);
          try {
            switch (operation.kind) {
              case 'save':
                await service.updateContent(
                  created.id,
                  contentFor(operation.complete, operation.complaint),
                  TEST_AUTHOR_ID
                );
                appended++;
                break;
              case 'restore':
                await service.restoreVersion(created.id, operation.versionNumber, TEST_AUTHOR_ID);
                appended++;
                break;
              case 'status':
                await service.changeStatus(created.id, operation.to);
                expect(canTransition(before.status, operation.to)).toBe(true);
                break;
            }
            accepted++;
          } catch (error) {
            if (!isLifecycleRejection(error)) {
              throw error;
            }
            expect(await service.getReport(created.id)).toEqual(before);
          }
        }

        const report = await service.getReport(created.id);
        const versions = await service.listVersions(created.id);

        expect(versions.map((v) => v.versionNumber)).toEqual(
          Array.from({ length: appended }, (_, i) => appended - i)
        );
        expect(report.content).toEqual(versions[0]?.content);
        expect(report.revision).toBe(1 + accepted);
        expect(report.finalizedAt !== null).toBe(isFinalizedStatus(report.status));
      }),
      { numRuns: 50 }
    );
  });

  it('should only grow the ledger while the report is a draft', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.constantFrom<ReportStatus>('in_review', 'approved', 'signed', 'cancelled'),
        fc.string({ minLength: 1, maxLength: 20 }),
        async (status, complaint) => {
          const service = new ReportService({
            store: new InMemoryReportStore(),
            logger: createLogger({ level: 'silent' }),
          });
          const created = await service.create(createTestReportInput());
          await service.updateContent(created.id, createCompleteContent(), TEST_AUTHOR_ID);

          const path: ReportStatus[] =
            status === 'cancelled'
              ? ['cancelled']
              : (['in_review', 'approved', 'signed'] as const).slice(
                  0,
                  ['in_review', 'approved', 'signed'].indexOf(status) + 1
                );
          for (const next of path) {
            await service.changeStatus(created.id, next);
          }

          await expect(
            service.updateContent(created.id, contentFor(true, complaint), TEST_AUTHOR_ID)
          ).rejects.toBeInstanceOf(EditNotAllowedError);
          expect(await service.listVersions(created.id)).toHaveLength(2);
        }
      ),
      { numRuns: 20 }
    );
  });
});
