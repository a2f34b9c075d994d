export type ThreeDsCryptoErrorCode =
  | 'UNSUPPORTED_PLATFORM'
  | 'AUTHENTICATION_FAILED'
  | 'MALFORMED_ENVELOPE'
  | 'CERTIFICATE_LOAD_ERROR'
  | 'KEY_GENERATION_FAILURE'
  | 'KEY_AGREEMENT_FAILED';

/**
 * Base class for failures raised by the challenge cryptography.
 * `code` is stable and safe to return to clients; messages never carry key
 * material.
 */
export abstract class ThreeDsCryptoError extends Error {
  abstract readonly code: ThreeDsCryptoErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The JWE `enc` value (or a platform/algorithm pairing) is not one the
 * device SDKs use.
 */
export class UnsupportedPlatformError extends ThreeDsCryptoError {
  readonly code = 'UNSUPPORTED_PLATFORM';
}

/**
 * Tag or HMAC mismatch. The message is fixed so callers cannot learn where
 * verification failed.
 */
export class AuthenticationFailedError extends ThreeDsCryptoError {
  readonly code = 'AUTHENTICATION_FAILED';

  constructor() {
    super('JWE authentication failed');
  }
}

/** Wrong segment count, invalid base64url or an unparseable header or payload. */
export class MalformedEnvelopeError extends ThreeDsCryptoError {
  readonly code = 'MALFORMED_ENVELOPE';
}

export class CertificateLoadError extends ThreeDsCryptoError {
  readonly code = 'CERTIFICATE_LOAD_ERROR';
}

/** The CSPRNG could not produce a key pair. Fatal for the request. */
export class KeyGenerationFailureError extends ThreeDsCryptoError {
  readonly code = 'KEY_GENERATION_FAILURE';
}

/** Invalid peer public key or private scalar for ECDH. */
export class KeyAgreementError extends ThreeDsCryptoError {
  readonly code = 'KEY_AGREEMENT_FAILED';
}
