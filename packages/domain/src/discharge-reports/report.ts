/**
 * @fileoverview Report Aggregate
 *
 * Pure state transitions of the report aggregate. Persistence and ledger
 * appends are orchestrated by the report service; nothing here performs I/O.
 *
 * Invariant: `finalizedAt` is non-null iff status is approved or signed. It is
 * cleared on the way back to draft, so a report approved again is stamped
 * with the wall-clock time of that approval.
 *
 * @module domain/discharge-reports/report
 */

import { v4 as uuidv4 } from 'uuid';
import { EditNotAllowedError, InvalidPatientIdError } from '@dischargekit/core';
import {
  NATIONAL_ID_LENGTH,
  type CreateReportInput,
  type Report,
  type ReportContent,
  type ReportStatus,
  type ReportVersion,
} from '@dischargekit/types';
import { createEmptyContent } from './report-content.js';
import { assertTransition, isEditableStatus, isFinalizedStatus } from './report-workflow.js';

export const INITIAL_VERSION_COMMENT = 'Initial version';
export const AUTO_SAVE_COMMENT = 'Auto-save';

export function restoredVersionComment(versionNumber: number): string {
  return `Restored from version ${versionNumber}`;
}

/**
 * @throws {InvalidPatientIdError} unless the id is exactly 13 characters
 */
export function assertPatientNationalId(nationalId: string): void {
  if (nationalId.length !== NATIONAL_ID_LENGTH) {
    throw new InvalidPatientIdError(NATIONAL_ID_LENGTH, nationalId.length);
  }
}

/**
 * Build a new draft report with empty content and revision 1
 */
export function createReport(input: CreateReportInput, now: Date = new Date()): Report {
  assertPatientNationalId(input.patientNationalId);

  return {
    id: uuidv4(),
    hospitalId: input.hospitalId,
    patientNationalId: input.patientNationalId,
    patientFirstName: input.patientFirstName,
    patientLastName: input.patientLastName,
    specialty: input.specialty,
    reportType: input.reportType,
    status: 'draft',
    content: createEmptyContent(),
    createdBy: input.authorId,
    createdAt: now,
    lastModified: now,
    finalizedAt: null,
    revision: 1,
  };
}

/**
 * Build a ledger entry; the version number is assigned by the ledger
 */
export function createVersion(
  reportId: string,
  versionNumber: number,
  content: ReportContent,
  savedBy: string,
  comment: string,
  savedAt: Date = new Date()
): ReportVersion {
  return {
    id: uuidv4(),
    reportId,
    versionNumber,
    content,
    savedAt,
    savedBy,
    comment,
  };
}

/**
 * @throws {EditNotAllowedError} unless the report is a draft
 */
export function assertEditable(report: Report): void {
  if (!isEditableStatus(report.status)) {
    throw new EditNotAllowedError(report.id, report.status);
  }
}

/**
 * Materialize new current content after a ledger append
 */
export function withContent(report: Report, content: ReportContent, now: Date = new Date()): Report {
  return { ...report, content, lastModified: now };
}

/**
 * Apply a status change permitted by the workflow table
 *
 * Completeness is checked by the caller; this only enforces the table and
 * maintains `finalizedAt`.
 *
 * @throws {InvalidTransitionError}
 */
export function withStatus(report: Report, target: ReportStatus, now: Date = new Date()): Report {
  assertTransition(report.status, target);

  let finalizedAt: Date | null = null;
  if (isFinalizedStatus(target)) {
    if (report.finalizedAt !== null) {
      finalizedAt = report.finalizedAt;
    } else {
      finalizedAt = now;
    }
  }

  return { ...report, status: target, lastModified: now, finalizedAt };
}
