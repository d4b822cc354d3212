/**
 * @fileoverview Report Status Workflow
 *
 * Finite-state machine governing report status changes. The transition table
 * is immutable domain knowledge; every function here is pure.
 *
 * ```
 * draft ──► in_review ──► approved ──► signed
 *   ▲  │        │  │         │
 *   │  │        │  └─► draft ◄┘
 *   │  └────────┴──► cancelled
 * ```
 *
 * Completeness gating is not the engine's concern: the report service
 * composes it with {@link canTransition} for draft → in_review.
 *
 * @module domain/discharge-reports/report-workflow
 */

import { InvalidTransitionError } from '@dischargekit/core';
import type { ReportStatus } from '@dischargekit/types';

/**
 * Allowed targets per status. Self-loops are absent on purpose: repeating a
 * status change is rejected, not treated as a no-op.
 */
export const VALID_STATUS_TRANSITIONS: Readonly<Record<ReportStatus, readonly ReportStatus[]>> = {
  draft: ['in_review', 'cancelled'],
  in_review: ['draft', 'approved', 'cancelled'],
  approved: ['signed', 'draft'],
  signed: [],
  cancelled: [],
};

/** Statuses that stamp `finalizedAt` */
export const FINALIZED_STATUSES: readonly ReportStatus[] = ['approved', 'signed'];

export function canTransition(current: ReportStatus, target: ReportStatus): boolean {
  return VALID_STATUS_TRANSITIONS[current].includes(target);
}

/**
 * @throws {InvalidTransitionError} when the table has no edge current → target
 */
export function assertTransition(current: ReportStatus, target: ReportStatus): void {
  if (!canTransition(current, target)) {
    throw new InvalidTransitionError(current, target);
  }
}

export function getNextAllowedStatuses(status: ReportStatus): readonly ReportStatus[] {
  return VALID_STATUS_TRANSITIONS[status];
}

/**
 * Terminal statuses have no outgoing transitions (signed, cancelled)
 */
export function isTerminalStatus(status: ReportStatus): boolean {
  return VALID_STATUS_TRANSITIONS[status].length === 0;
}

/**
 * Only drafts accept content edits, restores and deletion
 */
export function isEditableStatus(status: ReportStatus): boolean {
  return status === 'draft';
}

export function isFinalizedStatus(status: ReportStatus): boolean {
  return FINALIZED_STATUSES.includes(status);
}

/**
 * Whether the transition requires the content to pass the completeness check
 */
export function requiresCompleteContent(current: ReportStatus, target: ReportStatus): boolean {
  return current === 'draft' && target === 'in_review';
}
