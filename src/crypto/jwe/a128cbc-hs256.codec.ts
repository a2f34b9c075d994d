import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from 'crypto';
import { AUTH_TAG_LENGTH, CBC_IV_LENGTH, DERIVED_KEY_LENGTH, PLATFORM_ENC } from '../crypto.constants';
import { AuthenticationFailedError, MalformedEnvelopeError } from '../crypto.errors';
import type { EncryptedContent } from '../interfaces';
import type { JweCodec } from './jwe-codec.interface';

const HALF = DERIVED_KEY_LENGTH / 2;

/**
 * AES_128_CBC_HMAC_SHA_256 (RFC 7518 §5.2.3), the Android SDK's algorithm.
 *
 * The 32-byte key splits into MAC_KEY (first 16 bytes) and ENC_KEY (last
 * 16 bytes). The tag is the first 16 bytes of
 * HMAC-SHA-256(MAC_KEY, AAD || IV || ciphertext || AL), AL being the AAD
 * length in bits as a 64-bit big-endian integer.
 */
export class A128CbcHs256Codec implements JweCodec {
  readonly enc = PLATFORM_ENC.android;
  readonly keyLength = DERIVED_KEY_LENGTH;

  encrypt(plaintext: Buffer, aad: Buffer, key: Buffer): EncryptedContent {
    const { macKey, encKey } = this.splitKey(key);
    const iv = randomBytes(CBC_IV_LENGTH);

    const cipher = createCipheriv('aes-128-cbc', encKey, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const tag = this.computeTag(macKey, aad, iv, ciphertext);

    return { iv, ciphertext, tag };
  }

  decrypt(content: EncryptedContent, aad: Buffer, key: Buffer): Buffer {
    const { macKey, encKey } = this.splitKey(key);

    if (content.iv.length !== CBC_IV_LENGTH) {
      throw new MalformedEnvelopeError(`IV must be ${CBC_IV_LENGTH} bytes for ${this.enc}, got ${content.iv.length}`);
    }

    // The tag is checked before any AES work
    const expectedTag = this.computeTag(macKey, aad, content.iv, content.ciphertext);
    if (content.tag.length !== AUTH_TAG_LENGTH || !timingSafeEqual(content.tag, expectedTag)) {
      throw new AuthenticationFailedError();
    }

    try {
      const decipher = createDecipheriv('aes-128-cbc', encKey, content.iv);
      return Buffer.concat([decipher.update(content.ciphertext), decipher.final()]);
    } catch {
      // Bad padding behind a valid tag still yields no plaintext
      throw new AuthenticationFailedError();
    }
  }

  private splitKey(key: Buffer): { macKey: Buffer; encKey: Buffer } {
    if (key.length !== this.keyLength) {
      throw new RangeError(`${this.enc} needs a ${this.keyLength}-byte key, got ${key.length}`);
    }
    return { macKey: key.subarray(0, HALF), encKey: key.subarray(HALF) };
  }

  private computeTag(macKey: Buffer, aad: Buffer, iv: Buffer, ciphertext: Buffer): Buffer {
    const al = Buffer.alloc(8);
    al.writeBigUInt64BE(BigInt(aad.length) * 8n, 0);

    return createHmac('sha256', macKey)
      .update(aad)
      .update(iv)
      .update(ciphertext)
      .update(al)
      .digest()
      .subarray(0, AUTH_TAG_LENGTH);
  }
}
