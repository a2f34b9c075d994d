import { Injectable, Logger } from '@nestjs/common';
import { generateKeyPairSync } from 'crypto';
import { KeyGenerationFailureError } from './crypto.errors';
import { getErrorMessage } from '../shared/error.utils';
import type { EphemeralKeyPair } from './interfaces';

@Injectable()
export class EphemeralKeyService {
  private readonly logger = new Logger(EphemeralKeyService.name);

  /**
   * Generate a fresh P-256 key pair from the OS CSPRNG.
   * No fallback key is ever substituted: a failure aborts the request.
   *
   * @returns Private scalar and public JWK, coordinates base64url encoded
   * @throws {KeyGenerationFailureError} If the key pair cannot be generated
   */
  generate(): EphemeralKeyPair {
    try {
      const { privateKey } = generateKeyPairSync('ec', { namedCurve: 'P-256' });
      const { d, x, y } = privateKey.export({ format: 'jwk' });

      if (!d || !x || !y) {
        throw new Error('exported JWK is missing key components');
      }

      return {
        privateKey: d,
        publicKey: { kty: 'EC', crv: 'P-256', x, y },
      };
    } catch (error) {
      const errorMessage = getErrorMessage(error);
      this.logger.error(`Ephemeral key generation failed: ${errorMessage}`);
      throw new KeyGenerationFailureError(`Failed to generate ephemeral key pair: ${errorMessage}`);
    }
  }
}
