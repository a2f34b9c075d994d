import {
  FAILED_AUTHENTICATION_VALUE,
  VALID_OTP,
  evaluateOtp,
  generateAuthenticAuthValue,
} from '../authentication-value';

describe('generateAuthenticAuthValue', () => {
  it('produces the fixed 20-byte CAVV', () => {
    const value = generateAuthenticAuthValue();

    expect(value).toBe('AgF5ipusvc7f8AESIzRFVmd4iZo=');
    expect(Buffer.from(value, 'base64')).toHaveLength(20);
  });

  it('starts with the version and method bytes', () => {
    const bytes = Buffer.from(generateAuthenticAuthValue(), 'base64');

    expect(bytes[0]).toBe(0x02);
    expect(bytes[1]).toBe(0x01);
  });
});

describe('evaluateOtp', () => {
  it('authenticates the valid OTP', () => {
    expect(evaluateOtp(VALID_OTP)).toEqual({
      transStatus: 'Y',
      eci: '02',
      authenticationValue: 'AgF5ipusvc7f8AESIzRFVmd4iZo=',
    });
  });

  it.each(['', '0000', '12345', ' 1234'])('rejects %p', (otp) => {
    expect(evaluateOtp(otp)).toEqual({ transStatus: 'N', eci: '07', authenticationValue: FAILED_AUTHENTICATION_VALUE });
  });
});
