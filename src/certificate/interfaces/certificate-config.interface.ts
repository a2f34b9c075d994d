import type { KeyObject } from 'crypto';

/**
 * Where the ACS signing certificate and key are read from.
 */
export interface CertificateConfig {
  /** PEM certificate embedded as `x5c` in ACS signed content. */
  certPath: string;
  /** PEM RSA private key, PKCS#1 or PKCS#8. */
  keyPath: string;
}

/**
 * ACS signing material, loaded once at startup and shared read-only.
 */
export interface KeyMaterial {
  /** The certificate as read (PEM). */
  certificatePem: string;
  /** DER certificate, standard base64 without PEM framing. */
  x5c: string;
  /** RSA private key matching the certificate. */
  privateKey: KeyObject;
  /** Certificate subject, for logs and health output. */
  subject: string;
  /** Expiry date of the certificate. */
  validTo: Date;
}

/**
 * Outcome of the startup load. `unavailable` is a supported mode in which
 * ACS signed content falls back to a static value.
 */
export type KeyMaterialState =
  | { readonly kind: 'loaded'; readonly material: Readonly<KeyMaterial> }
  | { readonly kind: 'unavailable'; readonly reason: string };

/**
 * Represents the current status of the signing material.
 */
export interface CertificateStatus {
  /** `signed` when key material is loaded, `fallback` otherwise. */
  mode: 'signed' | 'fallback';
  /** Certificate subject. */
  subject?: string;
  /** The date the certificate expires. */
  expiresAt?: Date;
  /** The number of days until the certificate expires. */
  daysUntilExpiry?: number;
  /** Why key material is unavailable. */
  reason?: string;
}
