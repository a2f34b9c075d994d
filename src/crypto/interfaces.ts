import type { PLATFORM_ENC } from './crypto.constants';

/** Device platform, identified from the JWE `enc` header. */
export type Platform = keyof typeof PLATFORM_ENC;

/** Content encryption algorithms accepted on the challenge channel. */
export type ContentEncryption = (typeof PLATFORM_ENC)[Platform];

/** Direction a derived key is used in, seen from the ACS. */
export type KeyUsage = 'encrypt' | 'decrypt';

/**
 * EC public key as received from a device, before validation.
 */
export interface PeerPublicJwk {
  kty: string;
  crv: string;
  x: string;
  y: string;
}

/**
 * Public half of a P-256 key in JWK form. `x` and `y` are base64url
 * encoded 32-byte coordinates.
 */
export interface EcPublicJwk {
  kty: 'EC';
  crv: 'P-256';
  x: string;
  y: string;
}

/**
 * Per-transaction ACS ephemeral key pair. Lives in the transaction record
 * only; the private scalar is never serialized into a response.
 */
export interface EphemeralKeyPair {
  /** Base64url encoded 32-byte private scalar (`d`). */
  privateKey: string;
  publicKey: EcPublicJwk;
}

/**
 * 32 bytes of ConcatKDF output bound to the platform and algorithm it was
 * derived for.
 */
export interface DerivedKeyMaterial {
  readonly key: Buffer;
  readonly enc: ContentEncryption;
  readonly platform: Platform;
}

/** Protected header of a `dir` JWE as sent by the SDKs. */
export interface JweHeader {
  alg: string;
  enc: string;
  kid?: string;
  [name: string]: unknown;
}

/** Compact JWE split into its decoded parts. */
export interface JweEnvelope {
  header: JweHeader;
  /** ASCII base64url of the header, used verbatim as AAD. */
  protectedHeader: string;
  encryptedKey: Buffer;
  iv: Buffer;
  ciphertext: Buffer;
  tag: Buffer;
}

/** Output of a content encryption step, before serialization. */
export interface EncryptedContent {
  iv: Buffer;
  ciphertext: Buffer;
  tag: Buffer;
}

export type AcsSignedContent =
  | { kind: 'signed'; jwt: string }
  | { kind: 'fallback'; jwt: string; reason: string };

export interface AcsSignedContentInput {
  acsTransId: string;
  acsReferenceNumber: string;
  acsUrl: string;
  /** Accepts a full key pair; only the public coordinates are signed. */
  ephemeralPublicKey: EcPublicJwk | EphemeralKeyPair;
}
