import { BOOLEAN_TRUE_VALUES } from './config.constants';
import { isAllowedUrl } from './config.validators';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ports, TTLs and intervals are whole numbers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - Returned when the value is missing or empty
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Parses an absolute http(s) URL and strips any trailing slash so that
 * paths can be appended with a single `/`.
 *
 * @param name - Environment variable name, used in the error message
 * @param value - Raw value
 * @throws {Error} If the value is not an absolute http or https URL
 * @example
 * ```
 * parseUrl('TDS_PUBLIC_BASE_URL', 'https://acs.test/');
 * // Returns: 'https://acs.test'
 * ```
 */
export function parseUrl(name: string, value: string): string {
  const trimmed = value.trim();
  if (!isAllowedUrl(trimmed)) {
    throw new Error(`Invalid ${name}: "${value}" (must be an absolute http:// or https:// URL)`);
  }
  return trimmed.replace(/\/+$/, '');
}
