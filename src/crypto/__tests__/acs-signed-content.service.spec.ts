import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { decodeProtectedHeader, importX509, jwtVerify } from 'jose';
import { AcsSignedContentService } from '../acs-signed-content.service';
import { EphemeralKeyService } from '../ephemeral-key.service';
import { FALLBACK_ACS_SIGNED_CONTENT } from '../crypto.constants';
import { CertificateService } from '../../certificate/certificate.service';
import { CERTIFICATE_CONFIG } from '../../certificate/certificate.tokens';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import { writeTestKeyMaterial, type TestKeyMaterial } from '../../../test/helpers/test-key-material';
import type { CertificateConfig } from '../../certificate/interfaces';
import type { AcsSignedContent, EphemeralKeyPair } from '../interfaces';

function toPem(x5c: string): string {
  const lines = x5c.match(/.{1,64}/g) ?? [];
  return `-----BEGIN CERTIFICATE-----\n${lines.join('\n')}\n-----END CERTIFICATE-----`;
}

async function createService(config: CertificateConfig): Promise<AcsSignedContentService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [AcsSignedContentService, CertificateService, { provide: CERTIFICATE_CONFIG, useValue: config }],
  }).compile();
  return module.get<AcsSignedContentService>(AcsSignedContentService);
}

function expectSigned(content: AcsSignedContent): string {
  if (content.kind !== 'signed') {
    throw new Error(`expected signed content, got fallback: ${content.reason}`);
  }
  return content.jwt;
}

describe('AcsSignedContentService', () => {
  const restoreLogger = silenceNestLogger();
  let keyMaterial: TestKeyMaterial;
  let ephemeral: EphemeralKeyPair;

  beforeAll(() => {
    keyMaterial = writeTestKeyMaterial();
    ephemeral = new EphemeralKeyService().generate();
  });

  afterAll(() => {
    keyMaterial.cleanup();
    restoreLogger();
  });

  const input = () => ({
    acsTransId: 'c9fc760d-2278-4bb9-8e43-d6818eff7146',
    acsReferenceNumber: 'issuer1',
    acsUrl: 'http://127.0.0.1:8080/challenge',
    ephemeralPublicKey: ephemeral,
  });

  describe('with key material', () => {
    let service: AcsSignedContentService;

    beforeAll(async () => {
      service = await createService({ certPath: keyMaterial.certPath, keyPath: keyMaterial.keyPath });
    });

    it('should put PS256 and the certificate in the header', async () => {
      const jwt = expectSigned(await service.sign(input()));
      const header = decodeProtectedHeader(jwt);

      expect(header.alg).toBe('PS256');
      expect(header.typ).toBe('JWT');
      expect(header.x5c).toHaveLength(1);
      expect(toPem(header.x5c?.[0] ?? '').replace(/\s/g, '')).toBe(keyMaterial.certificatePem.replace(/\s/g, ''));
    });

    it('should verify against the embedded x5c certificate', async () => {
      const jwt = expectSigned(await service.sign(input()));
      const x5c = decodeProtectedHeader(jwt).x5c?.[0] ?? '';

      const { payload } = await jwtVerify(jwt, await importX509(toPem(x5c), 'PS256'));

      expect(payload).toEqual({
        acsTransID: 'c9fc760d-2278-4bb9-8e43-d6818eff7146',
        acsRefNumber: 'issuer1',
        acsURL: 'http://127.0.0.1:8080/challenge',
        acsEphemPubKey: ephemeral.publicKey,
      });
    });

    it('should never include the private scalar', async () => {
      const jwt = expectSigned(await service.sign(input()));
      const payload = JSON.parse(Buffer.from(jwt.split('.')[1], 'base64url').toString());

      expect(Object.keys(payload.acsEphemPubKey).sort()).toEqual(['crv', 'kty', 'x', 'y']);
    });

    it('should accept a bare public JWK', async () => {
      const jwt = expectSigned(await service.sign({ ...input(), ephemeralPublicKey: ephemeral.publicKey }));

      expect(jwt.split('.')).toHaveLength(3);
    });

    it('should fail verification when the payload is altered after signing', async () => {
      const jwt = expectSigned(await service.sign(input()));
      const [header, payload, signature] = jwt.split('.');
      const claims = JSON.parse(Buffer.from(payload, 'base64url').toString());
      const altered = Buffer.from(JSON.stringify({ ...claims, acsRefNumber: 'issuer2' })).toString('base64url');
      const key = await importX509(keyMaterial.certificatePem, 'PS256');

      await expect(jwtVerify(`${header}.${altered}.${signature}`, key)).rejects.toThrow('signature verification failed');
    });
  });

  describe('without key material', () => {
    it('should return the static fallback and log a warning when the files are missing', async () => {
      const warn = jest.spyOn(Logger.prototype, 'warn');
      const service = await createService({ certPath: '/nonexistent/acs-cert.pem', keyPath: '/nonexistent/key.pem' });

      const content = await service.sign(input());

      expect(content.kind).toBe('fallback');
      expect(content.jwt).toBe(FALLBACK_ACS_SIGNED_CONTENT);
      if (content.kind === 'fallback') {
        expect(content.reason).toContain('Cannot read certificate /nonexistent/acs-cert.pem');
      }
      expect(warn).toHaveBeenCalledWith(expect.stringContaining('Using static ACS signed content'));
    });

    it('should fall back when the certificate file is corrupt', async () => {
      // The key file is not a certificate
      const service = await createService({ certPath: keyMaterial.keyPath, keyPath: keyMaterial.keyPath });

      const content = await service.sign(input());

      expect(content.kind).toBe('fallback');
    });

    it('should ship a three-segment fallback JWT', () => {
      expect(FALLBACK_ACS_SIGNED_CONTENT.split('.')).toHaveLength(3);
      expect(decodeProtectedHeader(FALLBACK_ACS_SIGNED_CONTENT).alg).toBe('PS256');
    });
  });
});
