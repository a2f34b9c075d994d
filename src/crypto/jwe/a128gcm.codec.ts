import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { AUTH_TAG_LENGTH, DERIVED_KEY_LENGTH, GCM_IV_LENGTH, PLATFORM_ENC } from '../crypto.constants';
import { AuthenticationFailedError, MalformedEnvelopeError } from '../crypto.errors';
import type { EncryptedContent } from '../interfaces';
import type { JweCodec } from './jwe-codec.interface';

/**
 * AES-128-GCM, the iOS SDK's algorithm. Receives one 16-byte half of the
 * derived key; which half depends on the direction.
 */
export class A128GcmCodec implements JweCodec {
  readonly enc = PLATFORM_ENC.ios;
  readonly keyLength = DERIVED_KEY_LENGTH / 2;

  encrypt(plaintext: Buffer, aad: Buffer, key: Buffer): EncryptedContent {
    this.assertKey(key);
    const iv = randomBytes(GCM_IV_LENGTH);

    const cipher = createCipheriv('aes-128-gcm', key, iv, { authTagLength: AUTH_TAG_LENGTH });
    cipher.setAAD(aad);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

    return { iv, ciphertext, tag: cipher.getAuthTag() };
  }

  decrypt(content: EncryptedContent, aad: Buffer, key: Buffer): Buffer {
    this.assertKey(key);

    if (content.iv.length !== GCM_IV_LENGTH) {
      throw new MalformedEnvelopeError(`IV must be ${GCM_IV_LENGTH} bytes for ${this.enc}, got ${content.iv.length}`);
    }
    if (content.tag.length !== AUTH_TAG_LENGTH) {
      throw new AuthenticationFailedError();
    }

    try {
      const decipher = createDecipheriv('aes-128-gcm', key, content.iv, { authTagLength: AUTH_TAG_LENGTH });
      decipher.setAAD(aad);
      decipher.setAuthTag(content.tag);
      return Buffer.concat([decipher.update(content.ciphertext), decipher.final()]);
    } catch {
      throw new AuthenticationFailedError();
    }
  }

  private assertKey(key: Buffer): void {
    if (key.length !== this.keyLength) {
      throw new RangeError(`${this.enc} needs a ${this.keyLength}-byte key, got ${key.length}`);
    }
  }
}
