import { DERIVED_KEY_LENGTH, PLATFORM_ENC } from './crypto.constants';
import { UnsupportedPlatformError } from './crypto.errors';
import type { ContentEncryption, DerivedKeyMaterial, KeyUsage, Platform } from './interfaces';

export interface KeyRange {
  start: number;
  end: number;
}

const FULL_KEY: KeyRange = { start: 0, end: DERIVED_KEY_LENGTH };
const FIRST_HALF: KeyRange = { start: 0, end: DERIVED_KEY_LENGTH / 2 };
const SECOND_HALF: KeyRange = { start: DERIVED_KEY_LENGTH / 2, end: DERIVED_KEY_LENGTH };

/**
 * Map a JWE `enc` value to the device platform that produces it.
 * There is no default: an unknown value would only surface later as an
 * opaque tag failure.
 *
 * @throws {UnsupportedPlatformError} For any other `enc`
 */
export function detectPlatform(header: { enc?: unknown }): Platform {
  switch (header.enc) {
    case PLATFORM_ENC.android:
      return 'android';
    case PLATFORM_ENC.ios:
      return 'ios';
    default:
      throw new UnsupportedPlatformError(`Unsupported content encryption algorithm: ${String(header.enc)}`);
  }
}

export function encForPlatform(platform: Platform): ContentEncryption {
  return PLATFORM_ENC[platform];
}

export function isPlatform(value: string): value is Platform {
  return Object.prototype.hasOwnProperty.call(PLATFORM_ENC, value);
}

/**
 * Which bytes of the 32-byte derived key a codec receives.
 *
 * Android (A128CBC-HS256) takes the whole key in both directions and splits
 * it into MAC and encryption keys itself. iOS (A128GCM) decrypts inbound
 * requests with bytes 0..16 and encrypts outbound responses with bytes
 * 16..32, which is what the iOS SDK expects.
 */
export function selectKeyHalf(platform: Platform, usage: KeyUsage): KeyRange {
  if (platform === 'android') {
    return FULL_KEY;
  }
  return usage === 'decrypt' ? FIRST_HALF : SECOND_HALF;
}

/**
 * Slice the derived key for one direction of use.
 */
export function keyForUsage(derived: DerivedKeyMaterial, usage: KeyUsage): Buffer {
  const { start, end } = selectKeyHalf(derived.platform, usage);
  return derived.key.subarray(start, end);
}
