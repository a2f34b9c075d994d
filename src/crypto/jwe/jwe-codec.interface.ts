import type { ContentEncryption, EncryptedContent } from '../interfaces';

/**
 * Content encryption for one JWE `enc` value.
 *
 * `key` is the slice of the derived key chosen by `selectKeyHalf` for the
 * direction of use; `aad` is the ASCII base64url protected header.
 */
export interface JweCodec {
  readonly enc: ContentEncryption;

  /** Key length the codec expects, in bytes. */
  readonly keyLength: number;

  encrypt(plaintext: Buffer, aad: Buffer, key: Buffer): EncryptedContent;

  /**
   * @throws {AuthenticationFailedError} If the tag does not verify; no plaintext is returned
   * @throws {MalformedEnvelopeError} If the IV has the wrong length
   */
  decrypt(content: EncryptedContent, aad: Buffer, key: Buffer): Buffer;
}
