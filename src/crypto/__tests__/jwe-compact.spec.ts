import { decodeProtectedHeader, parseCompactJwe, readJweHeader, serializeCompactJwe } from '../jwe/jwe-compact';
import { MalformedEnvelopeError } from '../crypto.errors';

const b64u = (value: string | Buffer) => Buffer.from(value).toString('base64url');
const HEADER = b64u('{"alg":"dir","enc":"A128GCM","kid":"c9fc760d-2278-4bb9-8e43-d6818eff7146"}');

describe('parseCompactJwe', () => {
  it('should split and decode the five segments', () => {
    const compact = `${HEADER}..${b64u(Buffer.alloc(12, 1))}.${b64u('ciphertext')}.${b64u(Buffer.alloc(16, 2))}`;

    const envelope = parseCompactJwe(compact);

    expect(envelope.header).toEqual({
      alg: 'dir',
      enc: 'A128GCM',
      kid: 'c9fc760d-2278-4bb9-8e43-d6818eff7146',
    });
    expect(envelope.protectedHeader).toBe(HEADER);
    expect(envelope.encryptedKey).toHaveLength(0);
    expect(envelope.iv.equals(Buffer.alloc(12, 1))).toBe(true);
    expect(envelope.ciphertext.toString()).toBe('ciphertext');
    expect(envelope.tag.equals(Buffer.alloc(16, 2))).toBe(true);
  });

  it.each([
    ['three segments', `${HEADER}.a.b`],
    ['six segments', `${HEADER}..a.b.c.d`],
  ])('should reject %s', (_label, compact) => {
    expect(() => parseCompactJwe(compact)).toThrow(MalformedEnvelopeError);
  });

  it('should reject a non-empty encrypted key', () => {
    expect(() => parseCompactJwe(`${HEADER}.${b64u('key')}.AA.AA.AA`)).toThrow(
      'Encrypted key segment must be empty for direct encryption',
    );
  });

  it('should reject segments outside the base64url alphabet', () => {
    expect(() => parseCompactJwe(`${HEADER}..AA==.AA.AA`)).toThrow('Invalid base64url in JWE IV');
    expect(() => parseCompactJwe(`${HEADER}..AA.A+/A.AA`)).toThrow('Invalid base64url in JWE ciphertext');
  });

  it('should accept surrounding whitespace', () => {
    expect(parseCompactJwe(`  ${HEADER}..AA.AA.AA\n`).header.enc).toBe('A128GCM');
  });
});

describe('decodeProtectedHeader', () => {
  it('should reject a header that is not JSON', () => {
    expect(() => decodeProtectedHeader(b64u('not json'))).toThrow('JWE header is not valid JSON');
  });

  it('should reject a JSON array header', () => {
    expect(() => decodeProtectedHeader(b64u('["dir"]'))).toThrow('JWE header must be a JSON object');
  });

  it('should require string alg and enc', () => {
    expect(() => decodeProtectedHeader(b64u('{"alg":"dir"}'))).toThrow(
      'JWE header must carry string "alg" and "enc"',
    );
  });

  it('should reject a non-string kid', () => {
    expect(() => decodeProtectedHeader(b64u('{"alg":"dir","enc":"A128GCM","kid":7}'))).toThrow(
      'JWE header "kid" must be a string',
    );
  });

  it('should keep unknown header fields', () => {
    expect(decodeProtectedHeader(b64u('{"alg":"dir","enc":"A128GCM","cty":"JSON"}'))).toEqual({
      alg: 'dir',
      enc: 'A128GCM',
      cty: 'JSON',
      kid: undefined,
    });
  });
});

describe('serializeCompactJwe', () => {
  it('should leave the encrypted key segment empty', () => {
    const compact = serializeCompactJwe(HEADER, {
      iv: Buffer.from([0xfb, 0xff]),
      ciphertext: Buffer.from('x'),
      tag: Buffer.from([0]),
    });

    expect(compact).toBe(`${HEADER}.._-8.eA.AA`);
  });
});

describe('readJweHeader', () => {
  it('should read the header without touching the other segments', () => {
    expect(readJweHeader(`${HEADER}..!.!.!`).kid).toBe('c9fc760d-2278-4bb9-8e43-d6818eff7146');
  });

  it('should still require five segments', () => {
    expect(() => readJweHeader(HEADER)).toThrow('Compact JWE must have 5 segments, got 1');
  });
});
