/**
 * Discharge Report Schema Tests
 *
 * Tests for the report schemas including:
 * - Content defaults for a new, empty document
 * - Clinical date formats
 * - Aggregate and ledger records
 * - Service inputs
 */

import { describe, it, expect } from 'vitest';
import {
  ClinicalDateSchema,
  CreateReportInputSchema,
  ReportContentSchema,
  ReportListQuerySchema,
  ReportSchema,
  ReportVersionSchema,
  REPORT_SECTIONS,
  UUIDSchema,
} from '../index.js';

describe('ReportContentSchema', () => {
  it('should build an empty document from nothing', () => {
    const content = ReportContentSchema.parse({});

    expect(Object.keys(content)).toEqual([...REPORT_SECTIONS]);
    expect(content.anamnesis).toEqual({
      chiefComplaint: '',
      historyOfPresentIllness: '',
      pastMedicalHistory: '',
      allergies: '',
      socialHistory: '',
    });
    expect(content.examination.vitalSigns).toEqual({
      bloodPressure: '',
      heartRate: null,
      temperature: null,
      respiratoryRate: null,
      oxygenSaturation: null,
    });
    expect(content.treatment).toEqual({ medications: [], procedures: [] });
    expect(content.diagnosis).toEqual({
      primaryDiagnosis: { code: '', description: '' },
      secondaryDiagnoses: [],
      clinicalObservations: '',
    });
  });

  it('should keep supplied fields and default the rest', () => {
    const content = ReportContentSchema.parse({
      treatment: { medications: [{ name: 'Amoxicillin', dosage: '1 g' }] },
    });

    expect(content.treatment.medications).toEqual([
      {
        name: 'Amoxicillin',
        dosage: '1 g',
        frequency: '',
        route: '',
        startDate: null,
        endDate: null,
      },
    ]);
  });

  it('should reject an oxygen saturation above 100', () => {
    const result = ReportContentSchema.safeParse({
      examination: { vitalSigns: { oxygenSaturation: 101 } },
    });

    expect(result.success).toBe(false);
  });

  it('should reject unnamed medications and procedures', () => {
    expect(ReportContentSchema.safeParse({ treatment: { medications: [{ name: '' }] } }).success).toBe(
      false
    );
    expect(ReportContentSchema.safeParse({ treatment: { procedures: [{ name: '' }] } }).success).toBe(
      false
    );
  });
});

describe('ClinicalDateSchema', () => {
  it.each(['2024-03-01', '2024-03-01T08:30:00Z', '2024-03-01T08:30:00+02:00'])(
    'should accept %s',
    (value) => {
      expect(ClinicalDateSchema.parse(value)).toBe(value);
    }
  );

  it.each(['01/03/2024', '2024-13-45', 'tomorrow', ''])('should reject %j', (value) => {
    expect(ClinicalDateSchema.safeParse(value).success).toBe(false);
  });

  it('should default to null', () => {
    expect(ClinicalDateSchema.parse(undefined)).toBeNull();
    expect(ClinicalDateSchema.parse(null)).toBeNull();
  });
});

describe('ReportSchema', () => {
  const row = {
    id: '3f1c9a52-8d4b-4e6f-9a21-5c7d8e9f0a1b',
    hospitalId: 'hospital-1',
    patientNationalId: '1850312400123',
    patientFirstName: 'Ion',
    patientLastName: 'Popescu',
    specialty: 'cardiology',
    reportType: 'discharge_summary',
    status: 'approved',
    content: {},
    createdBy: 'dr-popescu',
    createdAt: '2024-03-08T09:00:00.000Z',
    lastModified: '2024-03-08T10:00:00.000Z',
    finalizedAt: '2024-03-08T10:00:00.000Z',
    revision: 4,
  };

  it('should coerce timestamps to dates', () => {
    const report = ReportSchema.parse(row);

    expect(report.createdAt).toEqual(new Date('2024-03-08T09:00:00.000Z'));
    expect(report.finalizedAt).toEqual(new Date('2024-03-08T10:00:00.000Z'));
  });

  it('should reject unknown statuses and specialties', () => {
    expect(ReportSchema.safeParse({ ...row, status: 'archived' }).success).toBe(false);
    expect(ReportSchema.safeParse({ ...row, specialty: 'dermatology' }).success).toBe(false);
  });

  it('should require a positive revision', () => {
    expect(ReportSchema.safeParse({ ...row, revision: 0 }).success).toBe(false);
  });
});

describe('ReportVersionSchema', () => {
  it('should require a positive version number', () => {
    const version = {
      id: '9b2e4c61-7a3d-4f85-b1c2-d3e4f5a6b7c8',
      reportId: '3f1c9a52-8d4b-4e6f-9a21-5c7d8e9f0a1b',
      versionNumber: 1,
      content: {},
      savedAt: '2024-03-08T09:00:00.000Z',
      savedBy: 'dr-popescu',
      comment: 'Initial version',
    };

    expect(ReportVersionSchema.safeParse(version).success).toBe(true);
    expect(ReportVersionSchema.safeParse({ ...version, versionNumber: 0 }).success).toBe(false);
  });
});

describe('CreateReportInputSchema', () => {
  const input = {
    hospitalId: 'hospital-1',
    patientNationalId: '1850312400123',
    patientFirstName: 'Ion',
    patientLastName: 'Popescu',
    specialty: 'internal_medicine',
    reportType: 'transfer_summary',
    authorId: 'dr-popescu',
  };

  it('should accept a complete input', () => {
    expect(CreateReportInputSchema.parse(input)).toEqual(input);
  });

  it('should require the author and patient names', () => {
    expect(CreateReportInputSchema.safeParse({ ...input, authorId: '' }).success).toBe(false);
    expect(CreateReportInputSchema.safeParse({ ...input, patientLastName: '' }).success).toBe(false);
  });
});

describe('ReportListQuerySchema', () => {
  it('should leave paging optional', () => {
    expect(ReportListQuerySchema.parse({ authorId: 'dr-popescu' })).toEqual({ authorId: 'dr-popescu' });
  });

  it('should reject fractional paging', () => {
    expect(ReportListQuerySchema.safeParse({ authorId: 'dr-popescu', offset: 1.5 }).success).toBe(false);
  });
});

describe('UUIDSchema', () => {
  it('should reject non-UUID strings', () => {
    expect(UUIDSchema.safeParse('report-1').success).toBe(false);
  });
});
