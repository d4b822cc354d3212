/**
 * Central export point for the report schemas
 */

// =============================================================================
// Common/Validation Schemas
// =============================================================================
export {
  UUIDSchema,
  TimestampSchema,
  ClinicalDateSchema,
  type UUID,
  type Timestamp,
  type ClinicalDate,
} from './common.js';

// =============================================================================
// Discharge Report Schemas
// =============================================================================
export {
  REPORT_STATUSES,
  ReportStatusSchema,
  SPECIALTIES,
  SpecialtySchema,
  REPORT_TYPES,
  ReportTypeSchema,
  REPORT_SECTIONS,
  ReportSectionSchema,
  NATIONAL_ID_LENGTH,
  PatientDataSectionSchema,
  AnamnesisSectionSchema,
  VitalSignsSchema,
  ExaminationSectionSchema,
  LabTestSchema,
  ImagingStudySchema,
  LabResultsSectionSchema,
  DiagnosisCodeSchema,
  DiagnosisSectionSchema,
  MedicationSchema,
  ProcedureSchema,
  TreatmentSectionSchema,
  RecommendationsSectionSchema,
  ReportContentSchema,
  ReportSchema,
  ReportVersionSchema,
  CreateReportInputSchema,
  ReportListQuerySchema,
  type ReportStatus,
  type Specialty,
  type ReportType,
  type ReportSection,
  type PatientDataSection,
  type AnamnesisSection,
  type VitalSigns,
  type ExaminationSection,
  type LabTest,
  type ImagingStudy,
  type LabResultsSection,
  type DiagnosisCode,
  type DiagnosisSection,
  type Medication,
  type Procedure,
  type TreatmentSection,
  type RecommendationsSection,
  type ReportContent,
  type ReportContentInput,
  type Report,
  type ReportVersion,
  type CreateReportInput,
  type ReportListQuery,
} from './discharge-report.js';
