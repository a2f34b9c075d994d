/** OTP accepted by the mock ACS. */
export const VALID_OTP = '1234';

export const FAILED_AUTHENTICATION_VALUE = 'AAAAAAAAAAAAAAAAAAAAAA==';

export interface OtpOutcome {
  transStatus: 'Y' | 'N';
  eci: string;
  authenticationValue: string;
}

/**
 * 20-byte CAVV-shaped value: version byte, method byte and a fixed
 * pattern, standard base64.
 */
export function generateAuthenticAuthValue(): string {
  const cavv = Buffer.alloc(20);
  cavv[0] = 0x02;
  cavv[1] = 0x01;
  for (let i = 2; i < cavv.length; i++) {
    cavv[i] = (i * 17 + 13 + 0x4a) % 256;
  }
  return cavv.toString('base64');
}

export function evaluateOtp(otp: string): OtpOutcome {
  if (otp === VALID_OTP) {
    return { transStatus: 'Y', eci: '02', authenticationValue: generateAuthenticAuthValue() };
  }
  return { transStatus: 'N', eci: '07', authenticationValue: FAILED_AUTHENTICATION_VALUE };
}

