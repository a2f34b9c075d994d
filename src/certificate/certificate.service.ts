import { Inject, Injectable, Logger } from '@nestjs/common';
import { X509Certificate, createPrivateKey, type KeyObject } from 'crypto';
import { readFileSync } from 'fs';
import { CertificateLoadError } from '../crypto/crypto.errors';
import { getErrorMessage } from '../shared/error.utils';
import { CERTIFICATE_CONFIG } from './certificate.tokens';
import type { CertificateConfig, CertificateStatus, KeyMaterial, KeyMaterialState } from './interfaces';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Loads the ACS signing certificate and RSA key once, before the app serves
 * traffic, and hands the result out read-only.
 *
 * A missing or invalid file never stops startup: the state becomes
 * `unavailable` and ACS signed content falls back to a static value.
 */
@Injectable()
export class CertificateService {
  private readonly logger = new Logger(CertificateService.name);
  private readonly state: KeyMaterialState;

  /**
   * Constructor
   */
  /* v8 ignore next - false positive on constructor parameter property */
  constructor(@Inject(CERTIFICATE_CONFIG) private readonly config: CertificateConfig) {
    this.state = this.loadKeyMaterial();
  }

  /**
   * The key material loaded at startup.
   */
  getState(): KeyMaterialState {
    return this.state;
  }

  /**
   * Summarizes the signing material for health and metrics output.
   */
  getStatus(now: Date = new Date()): CertificateStatus {
    if (this.state.kind === 'unavailable') {
      return { mode: 'fallback', reason: this.state.reason };
    }

    const { subject, validTo } = this.state.material;
    return {
      mode: 'signed',
      subject,
      expiresAt: validTo,
      daysUntilExpiry: Math.floor((validTo.getTime() - now.getTime()) / MS_PER_DAY),
    };
  }

  private loadKeyMaterial(): KeyMaterialState {
    try {
      const material = this.readKeyMaterial();

      this.logger.log('✓ ACS signing certificate loaded');
      this.logger.log(`  Subject: ${material.subject}`);
      this.logger.log(`  Expires: ${material.validTo.toISOString()}`);
      if (material.validTo.getTime() < Date.now()) {
        this.logger.warn('ACS signing certificate has expired; SDKs may reject the signed content');
      }

      return Object.freeze({ kind: 'loaded', material: Object.freeze(material) });
    } catch (error) {
      const reason = getErrorMessage(error);
      this.logger.warn(`ACS signing material unavailable, signed content will use the static fallback: ${reason}`);
      return Object.freeze({ kind: 'unavailable', reason });
    }
  }

  /**
   * @throws {CertificateLoadError} If either file is missing, unparseable, not RSA, or they do not match
   */
  private readKeyMaterial(): KeyMaterial {
    const certificatePem = this.readPem(this.config.certPath, 'certificate');
    const keyPem = this.readPem(this.config.keyPath, 'private key');

    let certificate: X509Certificate;
    try {
      certificate = new X509Certificate(certificatePem);
    } catch (error) {
      throw new CertificateLoadError(`Invalid certificate ${this.config.certPath}: ${getErrorMessage(error)}`);
    }

    let privateKey: KeyObject;
    try {
      // PKCS#1 and PKCS#8 PEM are both accepted
      privateKey = createPrivateKey({ key: keyPem, format: 'pem' });
    } catch (error) {
      throw new CertificateLoadError(`Invalid private key ${this.config.keyPath}: ${getErrorMessage(error)}`);
    }

    if (privateKey.asymmetricKeyType !== 'rsa') {
      throw new CertificateLoadError(
        `Private key must be RSA for PS256, got ${privateKey.asymmetricKeyType ?? 'unknown'}`,
      );
    }
    if (!certificate.checkPrivateKey(privateKey)) {
      throw new CertificateLoadError('Private key does not match the certificate');
    }

    return {
      certificatePem,
      x5c: certificate.raw.toString('base64'),
      privateKey,
      subject: certificate.subject.replace(/\n/g, ', '),
      validTo: new Date(certificate.validTo),
    };
  }

  private readPem(path: string, label: string): string {
    try {
      return readFileSync(path, 'utf8');
    } catch (error) {
      throw new CertificateLoadError(`Cannot read ${label} ${path}: ${getErrorMessage(error)}`);
    }
  }
}
