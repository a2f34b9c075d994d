import { MalformedEnvelopeError } from './crypto.errors';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

/**
 * Base64URL encode (RFC 4648, no padding).
 */
export function base64urlEncode(data: Uint8Array | string): string {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
  return bytes.toString('base64url');
}

/**
 * Strict Base64URL decode. Node's decoder skips characters outside the
 * alphabet, so the input is checked first.
 *
 * @param value - Unpadded base64url text
 * @param label - Name of the field, used in the error message
 * @throws {MalformedEnvelopeError} If the value is not base64url
 */
export function base64urlDecode(value: string, label: string): Buffer {
  if (!BASE64URL_PATTERN.test(value) || value.length % 4 === 1) {
    throw new MalformedEnvelopeError(`Invalid base64url in ${label}`);
  }
  return Buffer.from(value, 'base64url');
}
