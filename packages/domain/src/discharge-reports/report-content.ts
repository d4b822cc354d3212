/**
 * @fileoverview Report Content Validation
 *
 * Two levels of checking:
 * - structural: {@link parseReportContent} applies the zod schema on every save
 * - clinical: the per-section validators below decide completeness, which is
 *   only enforced when a report leaves draft
 *
 * @module domain/discharge-reports/report-content
 */

import { ValidationError } from '@dischargekit/core';
import {
  NATIONAL_ID_LENGTH,
  ReportContentSchema,
  type AnamnesisSection,
  type DiagnosisSection,
  type PatientDataSection,
  type ReportContent,
  type ReportSection,
} from '@dischargekit/types';

export type ViolationCode =
  | 'REQUIRED_FIELD'
  | 'INVALID_NATIONAL_ID'
  | 'INVALID_DATE_RANGE'
  | 'INVALID_DIAGNOSIS_CODE';

export interface ContentViolation {
  section: ReportSection;
  field: string;
  code: ViolationCode;
  message: string;
}

export interface ValidationOutcome {
  valid: boolean;
  violations: ContentViolation[];
}

/**
 * Sections whose mandatory fields gate draft → in_review
 */
export const GATING_SECTIONS: readonly ReportSection[] = ['patientData', 'anamnesis', 'diagnosis'];

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function required(section: ReportSection, field: string, value: string): ContentViolation[] {
  return isBlank(value)
    ? [{ section, field, code: 'REQUIRED_FIELD', message: `${field} is required` }]
    : [];
}

export function validatePatientData(section: PatientDataSection): ContentViolation[] {
  const violations = [
    ...required('patientData', 'firstName', section.firstName),
    ...required('patientData', 'lastName', section.lastName),
  ];

  if (section.nationalId.length !== NATIONAL_ID_LENGTH) {
    violations.push({
      section: 'patientData',
      field: 'nationalId',
      code: 'INVALID_NATIONAL_ID',
      message: `nationalId must be exactly ${NATIONAL_ID_LENGTH} characters`,
    });
  }

  // Only comparable once both dates are captured
  if (section.admissionDate !== null && section.dischargeDate !== null) {
    if (Date.parse(section.dischargeDate) < Date.parse(section.admissionDate)) {
      violations.push({
        section: 'patientData',
        field: 'dischargeDate',
        code: 'INVALID_DATE_RANGE',
        message: 'dischargeDate cannot be before admissionDate',
      });
    }
  }

  return violations;
}

export function validateAnamnesis(section: AnamnesisSection): ContentViolation[] {
  return required('anamnesis', 'chiefComplaint', section.chiefComplaint);
}

export function validateDiagnosis(section: DiagnosisSection): ContentViolation[] {
  if (isBlank(section.primaryDiagnosis.code)) {
    return [
      {
        section: 'diagnosis',
        field: 'primaryDiagnosis.code',
        code: 'INVALID_DIAGNOSIS_CODE',
        message: 'primary diagnosis code is required',
      },
    ];
  }
  return [];
}

/** Capture-only sections: structurally valid once parsed */
const noMandatoryFields = (): ContentViolation[] => [];

const SECTION_VALIDATORS: {
  [S in ReportSection]: (section: ReportContent[S]) => ContentViolation[];
} = {
  patientData: validatePatientData,
  anamnesis: validateAnamnesis,
  examination: noMandatoryFields,
  labResults: noMandatoryFields,
  diagnosis: validateDiagnosis,
  treatment: noMandatoryFields,
  recommendations: noMandatoryFields,
};

/**
 * Validate a single section of a parsed document
 */
export function validateSection<S extends ReportSection>(
  section: S,
  content: ReportContent
): ValidationOutcome {
  const validator: (value: ReportContent[S]) => ContentViolation[] = SECTION_VALIDATORS[section];
  const violations = validator(content[section]);
  return { valid: violations.length === 0, violations };
}

/**
 * Validate the given sections (the gating sections by default)
 */
export function validateContent(
  content: ReportContent,
  sections: readonly ReportSection[] = GATING_SECTIONS
): ValidationOutcome {
  const violations = sections.flatMap((section) => validateSection(section, content).violations);
  return { valid: violations.length === 0, violations };
}

/**
 * Single completeness predicate used by the workflow gate
 */
export function isComplete(content: ReportContent): boolean {
  return validateContent(content).valid;
}

/**
 * Structurally validate content received from a caller
 *
 * @throws {ValidationError} with the flattened zod issues
 */
export function parseReportContent(input: unknown): ReportContent {
  const result = ReportContentSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Malformed report content', result.error.flatten());
  }
  return result.data;
}

export function createEmptyContent(): ReportContent {
  return ReportContentSchema.parse({});
}
