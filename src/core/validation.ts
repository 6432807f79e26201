import { ValidationError } from './errors';

export function requireText(value: string | undefined | null, message: string, operation: string): string {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') {
    throw new ValidationError(message, operation);
  }
  return trimmed;
}

export function requireId(value: number, field: string, operation: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer`, operation);
  }
  return value;
}

// `YYYY-MM-DDTHH:mm` as produced by datetime-local inputs; read as UTC
const LOCAL_MINUTES = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}$/;

/**
 * Parses an optional soft deadline. Accepts a Date, a `YYYY-MM-DDTHH:mm` string (UTC)
 * or any full ISO-8601 timestamp.
 */
export function parseDeadline(value: Date | string | null | undefined, operation: string): Date | null {
  if (value === undefined || value === null || value === '') return null;

  const parsed =
    value instanceof Date ? value : new Date(LOCAL_MINUTES.test(value) ? `${value}:00Z` : value);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`Invalid expiry date '${String(value)}'`, operation);
  }
  return parsed;
}
