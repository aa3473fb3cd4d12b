/**
 * Masks tokens and credentials before they reach log output
 */

// Matched case-insensitively as substrings of the field name
const DEFAULT_REDACT_FIELDS = [
  'token',
  'password',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'private',
  'bearer',
  'smtp_pass',
];

const SENSITIVE_PATTERNS = [
  /^glpat-[a-zA-Z0-9_-]+$/,               // GitLab personal access tokens
  /^(gloas|gldt|glrt|glptt)-[a-zA-Z0-9_-]+$/, // other GitLab token kinds
  /^Bearer\s+\S+$/,                         // raw Authorization header values
  /^eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/,     // JWT
];

const REDACTED = '[REDACTED]';

function shouldRedactField(fieldName: string, customFields: string[]): boolean {
  const normalizedName = fieldName.toLowerCase();
  const allFields = [...DEFAULT_REDACT_FIELDS, ...customFields.map(f => f.toLowerCase())];

  return allFields.some(field => normalizedName.includes(field));
}

function looksLikeSensitiveValue(value: string): boolean {
  return SENSITIVE_PATTERNS.some(pattern => pattern.test(value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactUnknown(value: unknown, customFields: string[]): unknown {
  if (typeof value === 'string') {
    return looksLikeSensitiveValue(value) ? REDACTED : value;
  }
  if (Array.isArray(value)) {
    return value.map(item => redactUnknown(item, customFields));
  }
  if (isRecord(value)) {
    return redact(value, customFields);
  }
  return value;
}

/**
 * Return a copy of `obj` with sensitive fields and token-shaped values
 * replaced by [REDACTED]. Nested objects and arrays are walked.
 */
export function redact(
  obj: Record<string, unknown>,
  customFields: string[] = []
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    result[key] = shouldRedactField(key, customFields) ? REDACTED : redactUnknown(value, customFields);
  }

  return result;
}
