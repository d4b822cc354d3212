/**
 * @fileoverview Tests for report content parsing and completeness rules
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@dischargekit/core';
import type { ReportContent } from '@dischargekit/types';
import {
  createEmptyContent,
  isComplete,
  parseReportContent,
  validateContent,
  validateSection,
} from '../discharge-reports/report-content.js';
import { createCompleteContent } from './report-fixtures.js';

const complete = (): ReportContent => parseReportContent(createCompleteContent());

describe('createEmptyContent', () => {
  it('should build every section with empty defaults', () => {
    const content = createEmptyContent();

    expect(content.patientData).toEqual({
      firstName: '',
      lastName: '',
      nationalId: '',
      birthDate: null,
      department: '',
      ward: '',
      bed: '',
      admissionDate: null,
      dischargeDate: null,
    });
    expect(content.labResults).toEqual({ laboratoryTests: [], imagingStudies: [] });
    expect(content.diagnosis.primaryDiagnosis).toEqual({ code: '', description: '' });
    expect(content.examination.vitalSigns.heartRate).toBeNull();
  });
});

describe('validateContent', () => {
  it('should list every gating violation of empty content in section order', () => {
    const outcome = validateContent(createEmptyContent());

    expect(outcome.valid).toBe(false);
    expect(outcome.violations.map(({ section, field, code }) => ({ section, field, code }))).toEqual([
      { section: 'patientData', field: 'firstName', code: 'REQUIRED_FIELD' },
      { section: 'patientData', field: 'lastName', code: 'REQUIRED_FIELD' },
      { section: 'patientData', field: 'nationalId', code: 'INVALID_NATIONAL_ID' },
      { section: 'anamnesis', field: 'chiefComplaint', code: 'REQUIRED_FIELD' },
      { section: 'diagnosis', field: 'primaryDiagnosis.code', code: 'INVALID_DIAGNOSIS_CODE' },
    ]);
  });

  it('should accept complete content', () => {
    expect(validateContent(complete())).toEqual({ valid: true, violations: [] });
  });

  it('should treat whitespace-only values as blank', () => {
    const content = complete();
    content.patientData.firstName = '   ';
    content.anamnesis.chiefComplaint = '\n\t';

    expect(validateContent(content).violations).toEqual([
      {
        section: 'patientData',
        field: 'firstName',
        code: 'REQUIRED_FIELD',
        message: 'firstName is required',
      },
      {
        section: 'anamnesis',
        field: 'chiefComplaint',
        code: 'REQUIRED_FIELD',
        message: 'chiefComplaint is required',
      },
    ]);
  });

  it('should require a 13 character national id', () => {
    const content = complete();
    content.patientData.nationalId = '185031240012';

    expect(validateContent(content).violations).toEqual([
      {
        section: 'patientData',
        field: 'nationalId',
        code: 'INVALID_NATIONAL_ID',
        message: 'nationalId must be exactly 13 characters',
      },
    ]);
  });

  it('should reject a discharge before admission', () => {
    const content = complete();
    content.patientData.admissionDate = '2024-03-08';
    content.patientData.dischargeDate = '2024-03-01';

    expect(validateContent(content).violations).toEqual([
      {
        section: 'patientData',
        field: 'dischargeDate',
        code: 'INVALID_DATE_RANGE',
        message: 'dischargeDate cannot be before admissionDate',
      },
    ]);
  });

  it('should accept a same-day discharge', () => {
    const content = complete();
    content.patientData.admissionDate = '2024-03-08';
    content.patientData.dischargeDate = '2024-03-08';

    expect(validateContent(content).valid).toBe(true);
  });

  it('should skip the date range check until both dates are present', () => {
    const content = complete();
    content.patientData.admissionDate = '2024-03-08';
    content.patientData.dischargeDate = null;

    expect(validateContent(content).valid).toBe(true);
  });

  it('should validate only the requested sections', () => {
    const outcome = validateContent(createEmptyContent(), ['anamnesis']);

    expect(outcome.violations).toHaveLength(1);
    expect(outcome.violations[0]?.field).toBe('chiefComplaint');
  });
});

describe('validateSection', () => {
  it('should accept capture-only sections when empty', () => {
    const empty = createEmptyContent();

    expect(validateSection('examination', empty).valid).toBe(true);
    expect(validateSection('labResults', empty).valid).toBe(true);
    expect(validateSection('treatment', empty).valid).toBe(true);
    expect(validateSection('recommendations', empty).valid).toBe(true);
  });

  it('should dispatch to the section validator', () => {
    const outcome = validateSection('diagnosis', createEmptyContent());

    expect(outcome.valid).toBe(false);
    expect(outcome.violations[0]?.code).toBe('INVALID_DIAGNOSIS_CODE');
  });
});

describe('isComplete', () => {
  it('should follow the gating sections only', () => {
    const content = complete();
    content.recommendations.followUp = '';

    expect(isComplete(content)).toBe(true);
    expect(isComplete(createEmptyContent())).toBe(false);
  });
});

describe('parseReportContent', () => {
  it('should fill missing sections with defaults', () => {
    expect(parseReportContent({})).toEqual(createEmptyContent());
  });

  it('should accept ISO dates and date-times', () => {
    const content = parseReportContent({
      patientData: { admissionDate: '2024-03-01T08:30:00Z', dischargeDate: '2024-03-08' },
    });

    expect(content.patientData.admissionDate).toBe('2024-03-01T08:30:00Z');
    expect(content.patientData.dischargeDate).toBe('2024-03-08');
  });

  it('should reject malformed dates', () => {
    expect(() => parseReportContent({ patientData: { admissionDate: 'last tuesday' } })).toThrow(
      ValidationError
    );
  });

  it('should reject structurally invalid entries', () => {
    expect(() =>
      parseReportContent({ labResults: { laboratoryTests: [{ name: '', result: '12' }] } })
    ).toThrow('Malformed report content');
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseReportContent({ anamnesis: { chiefComplaint: 42 } })).toThrow(
      ValidationError
    );
  });
});
