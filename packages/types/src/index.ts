/**
 * Discharge Report Types Package
 *
 * Zod schemas and inferred TypeScript types shared by the report core.
 * All schemas live in the schemas/ directory.
 *
 * @module @dischargekit/types
 */

export * from './schemas/index.js';
