import { cleanDisplayName } from '../matching/normalizeName';
import { AppError } from './AppError';

/**
 * Cleans a required name-like input, rejecting blanks.
 */
export function requireName(value: string, field = 'name'): string {
  const cleaned = cleanDisplayName(value);
  if (!cleaned) {
    throw AppError.validation(`${field} is required`, { field });
  }
  return cleaned;
}

/**
 * Optional free text: trimmed, blank becomes null.
 */
export function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function assertLimit(limit: number, field = 'limit'): number {
  if (!Number.isInteger(limit) || limit < 1) {
    throw AppError.validation(`${field} must be a positive integer`, { [field]: limit });
  }
  return limit;
}

export function assertThreshold(threshold: number): number {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
    throw AppError.validation('threshold must be between 0 and 100', { threshold });
  }
  return threshold;
}

export function assertValidDate(value: Date, field = 'dueDate'): Date {
  if (Number.isNaN(value.getTime())) {
    throw AppError.validation(`${field} is not a valid date`, { field });
  }
  return value;
}
