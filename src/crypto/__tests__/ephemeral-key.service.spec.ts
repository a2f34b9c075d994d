import { EphemeralKeyService } from '../ephemeral-key.service';
import { KeyGenerationFailureError } from '../crypto.errors';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';
import * as nodeCrypto from 'crypto';

jest.mock('crypto', () => ({
  ...jest.requireActual<typeof import('crypto')>('crypto'),
  generateKeyPairSync: jest.fn(jest.requireActual<typeof import('crypto')>('crypto').generateKeyPairSync),
}));

// P-256 domain parameters (FIPS 186-4 D.1.2.3)
const P = BigInt('0xffffffff00000001000000000000000000000000ffffffffffffffffffffffff');
const B = BigInt('0x5ac635d8aa3a93e7b3ebbd55769886bc651d06b0cc53b0f63bce3c3e27d2604b');

function toBigInt(b64u: string): bigint {
  return BigInt(`0x${Buffer.from(b64u, 'base64url').toString('hex')}`);
}

function mod(value: bigint): bigint {
  const r = value % P;
  return r >= 0n ? r : r + P;
}

function isOnCurve(x: bigint, y: bigint): boolean {
  return mod(y * y) === mod(x * x * x - 3n * x + B);
}

describe('EphemeralKeyService', () => {
  const service = new EphemeralKeyService();

  it('should return a P-256 public JWK with 32-byte coordinates', () => {
    const { privateKey, publicKey } = service.generate();

    expect(publicKey.kty).toBe('EC');
    expect(publicKey.crv).toBe('P-256');
    expect(Buffer.from(publicKey.x, 'base64url')).toHaveLength(32);
    expect(Buffer.from(publicKey.y, 'base64url')).toHaveLength(32);
    expect(Buffer.from(privateKey, 'base64url')).toHaveLength(32);
  });

  it('should never repeat a private scalar and always land on the curve across 1000 keys', () => {
    const scalars = new Set<string>();

    for (let i = 0; i < 1000; i++) {
      const { privateKey, publicKey } = service.generate();
      scalars.add(privateKey);
      expect(isOnCurve(toBigInt(publicKey.x), toBigInt(publicKey.y))).toBe(true);
    }

    expect(scalars.size).toBe(1000);
  });

  it('should wrap generator failures in KeyGenerationFailureError', () => {
    const restoreLogger = silenceNestLogger();
    jest.mocked(nodeCrypto.generateKeyPairSync).mockImplementationOnce(() => {
      throw new Error('entropy source unavailable');
    });

    expect(() => service.generate()).toThrow(KeyGenerationFailureError);
    restoreLogger();
  });
});
