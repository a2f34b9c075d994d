import { MalformedEnvelopeError } from '../crypto.errors';
import { base64urlDecode, base64urlEncode } from '../encoding';
import type { EncryptedContent, JweEnvelope, JweHeader } from '../interfaces';
import { isRecord } from '../../shared/object.utils';

const COMPACT_SEGMENTS = 5;

/**
 * Decode and validate a protected header segment.
 *
 * @throws {MalformedEnvelopeError} If the segment is not a JSON object with string `alg` and `enc`
 */
export function decodeProtectedHeader(segment: string): JweHeader {
  const bytes = base64urlDecode(segment, 'JWE header');

  let parsed: unknown;
  try {
    parsed = JSON.parse(bytes.toString('utf8'));
  } catch {
    throw new MalformedEnvelopeError('JWE header is not valid JSON');
  }

  if (!isRecord(parsed)) {
    throw new MalformedEnvelopeError('JWE header must be a JSON object');
  }

  const { alg, enc, kid } = parsed;
  if (typeof alg !== 'string' || typeof enc !== 'string') {
    throw new MalformedEnvelopeError('JWE header must carry string "alg" and "enc"');
  }
  if (kid !== undefined && typeof kid !== 'string') {
    throw new MalformedEnvelopeError('JWE header "kid" must be a string');
  }

  return { ...parsed, alg, enc, kid };
}

/**
 * Split a compact JWE into its five parts.
 * The encrypted key segment must be empty: only `dir` is supported.
 *
 * @param compact - `header.encryptedKey.iv.ciphertext.tag`
 * @throws {MalformedEnvelopeError} On a wrong segment count or undecodable segment
 */
export function parseCompactJwe(compact: string): JweEnvelope {
  const segments = compact.trim().split('.');
  if (segments.length !== COMPACT_SEGMENTS) {
    throw new MalformedEnvelopeError(`Compact JWE must have ${COMPACT_SEGMENTS} segments, got ${segments.length}`);
  }

  const [protectedHeader, encryptedKey, iv, ciphertext, tag] = segments;
  const header = decodeProtectedHeader(protectedHeader);

  if (encryptedKey !== '') {
    throw new MalformedEnvelopeError('Encrypted key segment must be empty for direct encryption');
  }

  return {
    header,
    protectedHeader,
    encryptedKey: Buffer.alloc(0),
    iv: base64urlDecode(iv, 'JWE IV'),
    ciphertext: base64urlDecode(ciphertext, 'JWE ciphertext'),
    tag: base64urlDecode(tag, 'JWE tag'),
  };
}

/**
 * Join an already-encoded protected header and encrypted content into
 * compact form, with an empty encrypted key segment.
 */
export function serializeCompactJwe(protectedHeader: string, content: EncryptedContent): string {
  return [
    protectedHeader,
    '',
    base64urlEncode(content.iv),
    base64urlEncode(content.ciphertext),
    base64urlEncode(content.tag),
  ].join('.');
}

/**
 * Encode a header for use as the protected header (and AAD).
 */
export function encodeProtectedHeader(header: JweHeader): string {
  return base64urlEncode(JSON.stringify(header));
}

/**
 * Read the protected header of a compact JWE without decrypting it.
 * Used to route a challenge request by `kid` before any key is known.
 */
export function readJweHeader(compact: string): JweHeader {
  const segments = compact.trim().split('.');
  if (segments.length !== COMPACT_SEGMENTS) {
    throw new MalformedEnvelopeError(`Compact JWE must have ${COMPACT_SEGMENTS} segments, got ${segments.length}`);
  }
  return decodeProtectedHeader(segments[0]);
}
