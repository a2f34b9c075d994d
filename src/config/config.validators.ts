import { ALLOWED_URL_PROTOCOLS } from './config.constants';

/**
 * Checks that a value is an absolute URL using one of the allowed protocols.
 */
export function isAllowedUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return ALLOWED_URL_PROTOCOLS.some((protocol) => protocol === url.protocol);
}

/**
 * Rejects values that would make the server unusable: a zero port, or a
 * zero transaction TTL or sweep interval.
 *
 * @throws {Error} On the first invalid value
 */
export function validatePositive(name: string, value: number): number {
  if (value <= 0) {
    throw new Error(`${name} must be greater than 0 (got ${value})`);
  }
  return value;
}
