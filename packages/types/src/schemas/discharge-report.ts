/**
 * @fileoverview Discharge Report Schemas
 *
 * Zod schemas for the discharge report aggregate, its immutable version
 * snapshots and the seven clinical content sections.
 *
 * Every content field carries a default so that `ReportContentSchema.parse({})`
 * yields the empty document a new report starts with.
 *
 * @module types/schemas/discharge-report
 */

import { z } from 'zod';
import { UUIDSchema, TimestampSchema, ClinicalDateSchema } from './common.js';

// =============================================================================
// ENUMS & CONSTANTS
// =============================================================================

/**
 * Report workflow statuses
 */
export const REPORT_STATUSES = ['draft', 'in_review', 'approved', 'signed', 'cancelled'] as const;

export const ReportStatusSchema = z.enum(REPORT_STATUSES);
export type ReportStatus = z.infer<typeof ReportStatusSchema>;

export const SPECIALTIES = [
  'internal_medicine',
  'cardiology',
  'neurology',
  'pediatrics',
  'surgery',
] as const;

export const SpecialtySchema = z.enum(SPECIALTIES);
export type Specialty = z.infer<typeof SpecialtySchema>;

export const REPORT_TYPES = ['discharge_summary', 'transfer_summary', 'operative_note'] as const;

export const ReportTypeSchema = z.enum(REPORT_TYPES);
export type ReportType = z.infer<typeof ReportTypeSchema>;

/**
 * Content sections, in document order
 */
export const REPORT_SECTIONS = [
  'patientData',
  'anamnesis',
  'examination',
  'labResults',
  'diagnosis',
  'treatment',
  'recommendations',
] as const;

export const ReportSectionSchema = z.enum(REPORT_SECTIONS);
export type ReportSection = z.infer<typeof ReportSectionSchema>;

/** Length of the patient national identification number (CNP) */
export const NATIONAL_ID_LENGTH = 13;

const text = () => z.string().default('');

// =============================================================================
// CONTENT SECTIONS
// =============================================================================

export const PatientDataSectionSchema = z.object({
  firstName: text(),
  lastName: text(),
  nationalId: text(),
  birthDate: ClinicalDateSchema,
  department: text(),
  ward: text(),
  bed: text(),
  admissionDate: ClinicalDateSchema,
  dischargeDate: ClinicalDateSchema,
});

export const AnamnesisSectionSchema = z.object({
  chiefComplaint: text(),
  historyOfPresentIllness: text(),
  pastMedicalHistory: text(),
  allergies: text(),
  socialHistory: text(),
});

export const VitalSignsSchema = z.object({
  bloodPressure: text(),
  heartRate: z.number().int().nonnegative().nullable().default(null),
  temperature: z.number().nullable().default(null),
  respiratoryRate: z.number().int().nonnegative().nullable().default(null),
  oxygenSaturation: z.number().int().min(0).max(100).nullable().default(null),
});

export const ExaminationSectionSchema = z.object({
  generalCondition: text(),
  consciousness: text(),
  vitalSigns: VitalSignsSchema.default({}),
  systemsReview: text(),
});

export const LabTestSchema = z.object({
  name: z.string().min(1),
  result: text(),
  unit: text(),
  date: ClinicalDateSchema,
});

export const ImagingStudySchema = z.object({
  type: z.string().min(1),
  description: text(),
  date: ClinicalDateSchema,
});

export const LabResultsSectionSchema = z.object({
  laboratoryTests: z.array(LabTestSchema).default([]),
  imagingStudies: z.array(ImagingStudySchema).default([]),
});

/**
 * ICD-10 coded diagnosis
 */
export const DiagnosisCodeSchema = z.object({
  code: text(),
  description: text(),
});

export const DiagnosisSectionSchema = z.object({
  primaryDiagnosis: DiagnosisCodeSchema.default({}),
  secondaryDiagnoses: z.array(DiagnosisCodeSchema).default([]),
  clinicalObservations: text(),
});

export const MedicationSchema = z.object({
  name: z.string().min(1),
  dosage: text(),
  frequency: text(),
  route: text(),
  startDate: ClinicalDateSchema,
  endDate: ClinicalDateSchema,
});

export const ProcedureSchema = z.object({
  name: z.string().min(1),
  description: text(),
  performedAt: ClinicalDateSchema,
});

export const TreatmentSectionSchema = z.object({
  medications: z.array(MedicationSchema).default([]),
  procedures: z.array(ProcedureSchema).default([]),
});

export const RecommendationsSectionSchema = z.object({
  dischargePlan: text(),
  medications: text(),
  followUp: text(),
  dietRestrictions: text(),
  activityRestrictions: text(),
});

/**
 * Full clinical content of a discharge report
 */
export const ReportContentSchema = z.object({
  patientData: PatientDataSectionSchema.default({}),
  anamnesis: AnamnesisSectionSchema.default({}),
  examination: ExaminationSectionSchema.default({}),
  labResults: LabResultsSectionSchema.default({}),
  diagnosis: DiagnosisSectionSchema.default({}),
  treatment: TreatmentSectionSchema.default({}),
  recommendations: RecommendationsSectionSchema.default({}),
});

// =============================================================================
// AGGREGATE & LEDGER
// =============================================================================

export const ReportSchema = z.object({
  id: UUIDSchema,
  hospitalId: z.string().min(1),
  patientNationalId: z.string(),
  patientFirstName: z.string(),
  patientLastName: z.string(),
  specialty: SpecialtySchema,
  reportType: ReportTypeSchema,
  status: ReportStatusSchema,
  content: ReportContentSchema,
  createdBy: z.string().min(1),
  createdAt: TimestampSchema,
  lastModified: TimestampSchema,
  finalizedAt: TimestampSchema.nullable(),
  /** Optimistic concurrency token, incremented on every write of the report row */
  revision: z.number().int().positive(),
});

export const ReportVersionSchema = z.object({
  id: UUIDSchema,
  reportId: UUIDSchema,
  versionNumber: z.number().int().positive(),
  content: ReportContentSchema,
  savedAt: TimestampSchema,
  savedBy: z.string().min(1),
  comment: z.string(),
});

export const CreateReportInputSchema = z.object({
  hospitalId: z.string().min(1),
  patientNationalId: z.string(),
  patientFirstName: z.string().min(1),
  patientLastName: z.string().min(1),
  specialty: SpecialtySchema,
  reportType: ReportTypeSchema,
  authorId: z.string().min(1),
});

export const ReportListQuerySchema = z.object({
  authorId: z.string().min(1),
  status: ReportStatusSchema.optional(),
  limit: z.number().int().optional(),
  offset: z.number().int().optional(),
});

// =============================================================================
// INFERRED TYPES
// =============================================================================

export type PatientDataSection = z.infer<typeof PatientDataSectionSchema>;
export type AnamnesisSection = z.infer<typeof AnamnesisSectionSchema>;
export type VitalSigns = z.infer<typeof VitalSignsSchema>;
export type ExaminationSection = z.infer<typeof ExaminationSectionSchema>;
export type LabTest = z.infer<typeof LabTestSchema>;
export type ImagingStudy = z.infer<typeof ImagingStudySchema>;
export type LabResultsSection = z.infer<typeof LabResultsSectionSchema>;
export type DiagnosisCode = z.infer<typeof DiagnosisCodeSchema>;
export type DiagnosisSection = z.infer<typeof DiagnosisSectionSchema>;
export type Medication = z.infer<typeof MedicationSchema>;
export type Procedure = z.infer<typeof ProcedureSchema>;
export type TreatmentSection = z.infer<typeof TreatmentSectionSchema>;
export type RecommendationsSection = z.infer<typeof RecommendationsSectionSchema>;

export type ReportContent = z.infer<typeof ReportContentSchema>;
/** Content as accepted from callers: every field may be omitted and falls back to its default */
export type ReportContentInput = z.input<typeof ReportContentSchema>;

export type Report = z.infer<typeof ReportSchema>;
export type ReportVersion = z.infer<typeof ReportVersionSchema>;
export type CreateReportInput = z.infer<typeof CreateReportInputSchema>;
export type ReportListQuery = z.infer<typeof ReportListQuerySchema>;
