import { Inject, Injectable, Logger } from '@nestjs/common';
import { JWE_KEY_MANAGEMENT_ALG } from '../crypto.constants';
import { MalformedEnvelopeError, UnsupportedPlatformError } from '../crypto.errors';
import { detectPlatform, keyForUsage } from '../platform';
import { encodeProtectedHeader, parseCompactJwe, serializeCompactJwe } from './jwe-compact';
import type { JweCodec } from './jwe-codec.interface';
import type { ContentEncryption, DerivedKeyMaterial, JweHeader, KeyUsage } from '../interfaces';
import { isRecord } from '../../shared/object.utils';

export const JWE_CODECS = 'JWE_CODECS';

/**
 * Compact `dir` JWE for the challenge channel.
 *
 * The codec is picked once from the derived key's algorithm. By default the
 * ACS decrypts with the `decrypt` key half and encrypts with the `encrypt`
 * half; the usage arguments let tests play the device side.
 */
@Injectable()
export class JweService {
  private readonly logger = new Logger(JweService.name);
  private readonly codecs: ReadonlyMap<ContentEncryption, JweCodec>;

  constructor(@Inject(JWE_CODECS) codecs: JweCodec[]) {
    this.codecs = new Map(codecs.map((codec) => [codec.enc, codec]));
  }

  /**
   * Encrypt a JSON payload.
   *
   * @param payload - Serialized with `JSON.stringify`
   * @param header - Extra protected header fields; `kid` carries the acsTransID
   * @param derived - Key material, which also fixes `enc`
   * @returns Compact serialization with an empty encrypted key segment
   */
  encrypt(payload: object, header: { kid: string }, derived: DerivedKeyMaterial, usage: KeyUsage = 'encrypt'): string {
    const codec = this.codecFor(derived.enc);
    const jweHeader: JweHeader = { alg: JWE_KEY_MANAGEMENT_ALG, enc: derived.enc, kid: header.kid };
    const protectedHeader = encodeProtectedHeader(jweHeader);

    const content = codec.encrypt(
      Buffer.from(JSON.stringify(payload), 'utf8'),
      Buffer.from(protectedHeader, 'ascii'),
      keyForUsage(derived, usage),
    );

    return serializeCompactJwe(protectedHeader, content);
  }

  /**
   * Decrypt a compact JWE into a JSON object.
   *
   * @throws {MalformedEnvelopeError} On a bad envelope or a non-object payload
   * @throws {UnsupportedPlatformError} If `enc` is not the derived key's algorithm
   * @throws {AuthenticationFailedError} If the tag does not verify
   */
  decrypt(compact: string, derived: DerivedKeyMaterial, usage: KeyUsage = 'decrypt'): Record<string, unknown> {
    const envelope = parseCompactJwe(compact);

    if (envelope.header.alg !== JWE_KEY_MANAGEMENT_ALG) {
      throw new MalformedEnvelopeError(`Unsupported key management algorithm: ${envelope.header.alg}`);
    }

    const platform = detectPlatform(envelope.header);
    if (platform !== derived.platform) {
      throw new UnsupportedPlatformError(
        `Envelope uses ${envelope.header.enc} but the key was derived for ${derived.platform}`,
      );
    }

    const codec = this.codecFor(derived.enc);
    const plaintext = codec.decrypt(envelope, Buffer.from(envelope.protectedHeader, 'ascii'), keyForUsage(derived, usage));

    let payload: unknown;
    try {
      payload = JSON.parse(plaintext.toString('utf8'));
    } catch {
      throw new MalformedEnvelopeError('Decrypted payload is not valid JSON');
    }
    if (!isRecord(payload)) {
      throw new MalformedEnvelopeError('Decrypted payload must be a JSON object');
    }

    this.logger.debug(`Decrypted ${plaintext.length}-byte ${derived.enc} payload`);
    return payload;
  }

  private codecFor(enc: ContentEncryption): JweCodec {
    const codec = this.codecs.get(enc);
    if (!codec) {
      throw new UnsupportedPlatformError(`No codec registered for ${enc}`);
    }
    return codec;
  }
}
