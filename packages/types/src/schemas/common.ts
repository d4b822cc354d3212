/**
 * Common schemas shared across the report packages
 */
import { z } from 'zod';

/**
 * UUID v4 validation
 */
export const UUIDSchema = z.string().uuid('Invalid UUID format').describe('UUID v4 identifier');

/**
 * ISO 8601 timestamp
 */
export const TimestampSchema = z.coerce.date().describe('ISO 8601 timestamp');

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Clinical date: ISO 8601 calendar date (2024-03-01) or date-time, null when not captured
 */
export const ClinicalDateSchema = z
  .string()
  .refine(
    (value) =>
      (ISO_DATE.test(value) || z.string().datetime({ offset: true }).safeParse(value).success) &&
      !Number.isNaN(Date.parse(value)),
    'Invalid ISO 8601 date'
  )
  .nullable()
  .default(null)
  .describe('ISO 8601 date or date-time');

export type UUID = z.infer<typeof UUIDSchema>;
export type Timestamp = z.infer<typeof TimestampSchema>;
export type ClinicalDate = z.infer<typeof ClinicalDateSchema>;
