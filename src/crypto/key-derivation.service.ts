import { Injectable, Logger } from '@nestjs/common';
import { createECDH, createHash } from 'crypto';
import { DERIVED_KEY_LENGTH, P256_COORDINATE_LENGTH, SDK_REFERENCE_NUMBERS } from './crypto.constants';
import { KeyAgreementError, MalformedEnvelopeError, UnsupportedPlatformError } from './crypto.errors';
import { base64urlDecode } from './encoding';
import { encForPlatform, isPlatform } from './platform';
import { getErrorMessage } from '../shared/error.utils';
import type { ContentEncryption, DerivedKeyMaterial, EphemeralKeyPair, PeerPublicJwk, Platform } from './interfaces';

const UNCOMPRESSED_POINT_PREFIX = 0x04;
const KDF_ROUND_ONE = Buffer.from([0x00, 0x00, 0x00, 0x01]);
const EMPTY_LENGTH_PREFIX = Buffer.alloc(4);
// keydatalen in bits (256), big-endian
const SUPP_PUB_INFO = Buffer.from([0x00, 0x00, 0x01, 0x00]);

function lengthPrefixed(value: Buffer): Buffer {
  const length = Buffer.alloc(4);
  length.writeUInt32BE(value.length, 0);
  return Buffer.concat([length, value]);
}

/**
 * ECDH and ConcatKDF for the challenge channel.
 *
 * Both sides feed their own private scalar and the peer's public key into
 * {@link computeSharedSecret}, then run {@link deriveKey} with the SDK
 * reference number of the device platform.
 */
@Injectable()
export class KeyDerivationService {
  private readonly logger = new Logger(KeyDerivationService.name);

  /**
   * P-256 ECDH.
   *
   * @param peerPublicKey - The other side's public JWK
   * @param privateScalar - Own base64url encoded private scalar
   * @returns 32-byte shared secret Z
   * @throws {KeyAgreementError} If either key is not a valid P-256 key
   */
  computeSharedSecret(peerPublicKey: PeerPublicJwk, privateScalar: string): Buffer {
    const publicPoint = this.decodePublicPoint(peerPublicKey);
    const scalar = this.decodeComponent(privateScalar, 'private scalar');

    try {
      const ecdh = createECDH('prime256v1');
      ecdh.setPrivateKey(scalar);
      return ecdh.computeSecret(publicPoint);
    } catch (error) {
      // Node rejects off-curve points and out-of-range scalars here
      throw new KeyAgreementError(`ECDH failed: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Single-round ConcatKDF with SHA-256 (NIST SP 800-56A):
   * `SHA-256(00000001 || Z || AlgorithmID || PartyUInfo || PartyVInfo || SuppPubInfo)`.
   *
   * AlgorithmID and PartyUInfo are empty, PartyVInfo is the platform's SDK
   * reference number and SuppPubInfo is 256. The device SDKs derive the
   * same way.
   *
   * @throws {UnsupportedPlatformError} If `platform` is unknown or `enc` is not its algorithm
   */
  deriveKey(sharedSecret: Buffer, enc: ContentEncryption, platform: string): DerivedKeyMaterial {
    if (!isPlatform(platform)) {
      throw new UnsupportedPlatformError(`Unknown platform: ${platform}`);
    }
    if (encForPlatform(platform) !== enc) {
      throw new UnsupportedPlatformError(`Algorithm ${enc} is not used by the ${platform} SDK`);
    }

    const partyVInfo = lengthPrefixed(Buffer.from(SDK_REFERENCE_NUMBERS[platform], 'ascii'));

    const key = createHash('sha256')
      .update(KDF_ROUND_ONE)
      .update(sharedSecret)
      .update(EMPTY_LENGTH_PREFIX) // AlgorithmID
      .update(EMPTY_LENGTH_PREFIX) // PartyUInfo
      .update(partyVInfo)
      .update(SUPP_PUB_INFO)
      .digest();

    this.logger.debug(`Derived ${DERIVED_KEY_LENGTH}-byte ${enc} key for ${platform}`);

    return Object.freeze({ key, enc, platform });
  }

  /**
   * ECDH with the stored ACS key pair followed by ConcatKDF for the platform.
   */
  deriveChallengeKey(
    sdkPublicKey: PeerPublicJwk,
    acsKeyPair: EphemeralKeyPair,
    platform: Platform,
  ): DerivedKeyMaterial {
    const sharedSecret = this.computeSharedSecret(sdkPublicKey, acsKeyPair.privateKey);
    return this.deriveKey(sharedSecret, encForPlatform(platform), platform);
  }

  private decodePublicPoint(jwk: PeerPublicJwk): Buffer {
    if (jwk.kty !== 'EC' || jwk.crv !== 'P-256') {
      throw new KeyAgreementError(`Unsupported public key type: ${jwk.kty}/${jwk.crv}`);
    }
    const x = this.decodeComponent(jwk.x, 'x coordinate');
    const y = this.decodeComponent(jwk.y, 'y coordinate');
    return Buffer.concat([Buffer.from([UNCOMPRESSED_POINT_PREFIX]), x, y]);
  }

  private decodeComponent(value: string, label: string): Buffer {
    let bytes: Buffer;
    try {
      bytes = base64urlDecode(value, label);
    } catch (error) {
      if (error instanceof MalformedEnvelopeError) {
        throw new KeyAgreementError(error.message);
      }
      throw error;
    }
    if (bytes.length !== P256_COORDINATE_LENGTH) {
      throw new KeyAgreementError(`Invalid ${label} length: ${bytes.length} bytes (expected ${P256_COORDINATE_LENGTH})`);
    }
    return bytes;
  }
}
