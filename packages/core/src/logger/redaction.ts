/**
 * PHI redaction rules for medical-grade logging
 *
 * Patient identifiers and clinical free text never reach log output.
 *
 * SECURITY: Explicit path enumeration instead of wildcards so that new
 * fields are redacted deliberately and redaction behaviour is predictable.
 */

/**
 * Standard paths to redact in log objects
 *
 * IMPORTANT: When adding new patient or clinical fields to the report
 * schemas, explicitly add them here.
 */
export const REDACTION_PATHS: string[] = [
  // Report aggregate patient identifiers
  'patientNationalId',
  'patientFirstName',
  'patientLastName',
  'report.patientNationalId',
  'report.patientFirstName',
  'report.patientLastName',

  // Patient data section
  'nationalId',
  'firstName',
  'lastName',
  'birthDate',
  'patientData',
  'content.patientData',

  // Clinical content (HIPAA PHI)
  'content',
  'report.content',
  'version.content',
  'anamnesis',
  'chiefComplaint',
  'historyOfPresentIllness',
  'pastMedicalHistory',
  'allergies',
  'diagnosis',
  'primaryDiagnosis',
  'secondaryDiagnoses',
  'medications',
  'recommendations',

  // Authentication/credentials
  'password',
  'token',
  'authorization',
  'secret',
  'connectionString',
  'databaseUrl',
  'DATABASE_URL',
];

/**
 * Create redaction censor function
 * Returns a masked value that indicates redaction occurred
 */
export function createCensor(_value: unknown, path: string[]): string {
  const fieldName = path[path.length - 1] ?? 'unknown';
  return `[REDACTED:${fieldName}]`;
}

/**
 * Patterns for runtime PHI detection in string values
 */
export const PII_PATTERNS = {
  // Romanian CNP (Cod Numeric Personal): 13 digits, first digit 1-9
  nationalId: /\b[1-9]\d{12}\b/g,

  // Email addresses
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,

  // Postgres connection strings carry credentials
  connectionString: /\bpostgres(?:ql)?:\/\/[^\s]+/gi,
} as const;

/**
 * Redact PHI patterns from a string value
 *
 * Connection strings first so that embedded digits are not partially matched.
 */
export function redactString(value: string): string {
  let result = value;

  result = result.replace(PII_PATTERNS.connectionString, '[REDACTED:connection]');
  result = result.replace(PII_PATTERNS.email, '[REDACTED:email]');
  result = result.replace(PII_PATTERNS.nationalId, '[REDACTED:nationalId]');

  return result;
}

/**
 * Check if a path should be redacted
 */
export function shouldRedactPath(path: string): boolean {
  const normalizedPath = path.toLowerCase();
  return REDACTION_PATHS.some((redactPath) => {
    const normalizedRedact = redactPath.toLowerCase();
    // Exact match or ends with the field name
    return normalizedPath === normalizedRedact || normalizedPath.endsWith(`.${normalizedRedact}`);
  });
}

/**
 * Deep redact an object, applying PHI redaction to all string values
 */
export function deepRedactObject<T>(obj: T): T;
export function deepRedactObject(obj: unknown): unknown {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return redactString(obj);
  }

  if (Array.isArray(obj)) {
    return obj.map((item: unknown) => deepRedactObject(item));
  }

  if (obj instanceof Date) {
    return obj;
  }

  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = shouldRedactPath(key) ? `[REDACTED:${key}]` : deepRedactObject(value);
    }
    return result;
  }

  return obj;
}

/**
 * Mask a name for safe logging
 * Shows first initial of each part only
 *
 * @example
 * maskName('Ion Popescu') // returns 'I*** P***'
 */
export function maskName(name: string | undefined | null): string {
  if (!name) return '[NO_NAME]';

  const parts = name.trim().split(/\s+/);
  return parts.map((part) => (part.length > 0 ? `${part[0]}***` : '')).join(' ');
}

/**
 * Mask a national identification number, keeping the last 3 characters
 *
 * @example
 * maskNationalId('1850312400123') // returns '**********123'
 */
export function maskNationalId(nationalId: string | undefined | null): string {
  if (!nationalId) return '[NO_ID]';
  if (nationalId.length <= 3) return '*'.repeat(nationalId.length);

  return `${'*'.repeat(nationalId.length - 3)}${nationalId.slice(-3)}`;
}
