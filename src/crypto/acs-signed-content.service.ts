import { Injectable, Logger } from '@nestjs/common';
import { SignJWT } from 'jose';
import { CertificateService } from '../certificate/certificate.service';
import { ACS_SIGNING_ALG, FALLBACK_ACS_SIGNED_CONTENT } from './crypto.constants';
import { getErrorMessage } from '../shared/error.utils';
import type { AcsSignedContent, AcsSignedContentInput, EcPublicJwk } from './interfaces';

/**
 * Signs the `acsSignedContent` JWT carried in a mobile ARes.
 */
@Injectable()
export class AcsSignedContentService {
  private readonly logger = new Logger(AcsSignedContentService.name);

  /**
   * Constructor
   */
  constructor(private readonly certificateService: CertificateService) {}

  /**
   * Build and sign the ACS signed content.
   *
   * The header carries the ACS certificate as `x5c`; the payload carries
   * only the public coordinates of the ephemeral key. Without key material,
   * or when signing throws, the static fallback is returned instead.
   */
  async sign(input: AcsSignedContentInput): Promise<AcsSignedContent> {
    const state = this.certificateService.getState();
    if (state.kind === 'unavailable') {
      return this.fallback(state.reason);
    }

    try {
      const jwt = await new SignJWT({
        acsTransID: input.acsTransId,
        acsRefNumber: input.acsReferenceNumber,
        acsURL: input.acsUrl,
        acsEphemPubKey: this.publicCoordinates(input.ephemeralPublicKey),
      })
        .setProtectedHeader({ alg: ACS_SIGNING_ALG, typ: 'JWT', x5c: [state.material.x5c] })
        .sign(state.material.privateKey);

      this.logger.debug(`Signed ACS content for acsTransID ${input.acsTransId}`);
      return { kind: 'signed', jwt };
    } catch (error) {
      return this.fallback(`signing failed: ${getErrorMessage(error)}`);
    }
  }

  private fallback(reason: string): AcsSignedContent {
    this.logger.warn(`Using static ACS signed content (${reason})`);
    return { kind: 'fallback', jwt: FALLBACK_ACS_SIGNED_CONTENT, reason };
  }

  /** Strips `d` even when the caller hands over the whole key pair. */
  private publicCoordinates(key: AcsSignedContentInput['ephemeralPublicKey']): EcPublicJwk {
    const jwk = 'publicKey' in key ? key.publicKey : key;
    return { kty: jwk.kty, crv: jwk.crv, x: jwk.x, y: jwk.y };
  }
}
