import { buildAuthenticationRequestEcho, extractSdkEphemeralPublicKey } from '../authentication-request.builder';
import { buildAuthenticateRequest } from '../../../test/helpers/fixtures';

const RESULTS_URL = 'https://acs.example.test/3ds/results';

describe('extractSdkEphemeralPublicKey', () => {
  it('reads the nested key', () => {
    const request = buildAuthenticateRequest({
      sdkEphemeralPublicKey: { kty: 'EC', crv: 'P-256', x: 'nested-x', y: 'nested-y' },
    });

    expect(extractSdkEphemeralPublicKey(request)).toEqual({ kty: 'EC', crv: 'P-256', x: 'nested-x', y: 'nested-y' });
  });

  it('reads the top-level Kty/Crv/X/Y form', () => {
    const request = buildAuthenticateRequest({ Kty: 'EC', Crv: 'P-256', X: 'flat-x', Y: 'flat-y' });

    expect(extractSdkEphemeralPublicKey(request)).toEqual({ kty: 'EC', crv: 'P-256', x: 'flat-x', y: 'flat-y' });
  });

  it('prefers the nested key when both are present', () => {
    const request = buildAuthenticateRequest({
      sdkEphemeralPublicKey: { kty: 'EC', crv: 'P-256', x: 'nested-x', y: 'nested-y' },
      Kty: 'EC',
      Crv: 'P-256',
      X: 'flat-x',
      Y: 'flat-y',
    });

    expect(extractSdkEphemeralPublicKey(request)?.x).toBe('nested-x');
  });

  it('ignores an incomplete top-level key', () => {
    const request = buildAuthenticateRequest({ Kty: 'EC', Crv: 'P-256', X: 'flat-x' });

    expect(extractSdkEphemeralPublicKey(request)).toBeUndefined();
  });
});

describe('buildAuthenticationRequestEcho', () => {
  it('renames fields and stringifies numeric purchase data', () => {
    const request = buildAuthenticateRequest();
    const echo = buildAuthenticationRequestEcho(request, RESULTS_URL);

    expect(echo).toMatchObject({
      messageType: 'AReq',
      messageVersion: '2.2.0',
      messageCategory: '01',
      deviceChannel: '02',
      threeDSServerTransID: '6f1c2b9e-3d4a-4c8b-9e2f-1a2b3c4d5e6f',
      threeDSServerURL: RESULTS_URL,
      threeDSRequestorID: 'requestor-001',
      threeDSRequestorChallengeInd: '01',
      threeDSRequestorAuthenticationInfo: { threeDSReqAuthMethod: '01', threeDSReqAuthTimestamp: '202401011200' },
      acquirerBIN: '400551',
      acquirerMerchantID: 'merchant-001',
      notificationURL: 'https://merchant.example.test/notify',
      purchaseAmount: '1999',
      purchaseExponent: '2',
      recurringFrequency: '0',
      homePhone: { subscriber: '5550100', cc: '1' },
      deviceRenderOptions: { sdkUiType: ['01', '02'], sdkInterface: '03' },
    });
  });

  it('includes browser fields with browserIP and browserTZ spelling', () => {
    const echo = buildAuthenticationRequestEcho(buildAuthenticateRequest(), RESULTS_URL);

    expect(echo.browserIP).toBe('192.0.2.10');
    expect(echo.browserTZ).toBe('0');
    expect(echo.browserScreenHeight).toBe('1080');
    expect(echo.browserScreenWidth).toBe('1920');
  });

  it('omits browser fields for app transactions', () => {
    const echo = buildAuthenticationRequestEcho(
      buildAuthenticateRequest({ deviceChannel: '01', browserInformation: undefined }),
      RESULTS_URL,
    );

    expect(echo).not.toHaveProperty('browserIP');
    expect(echo).not.toHaveProperty('sdkEphemeralPublicKey');
  });

  it('carries the SDK ephemeral key when present', () => {
    const echo = buildAuthenticationRequestEcho(
      buildAuthenticateRequest({ Kty: 'EC', Crv: 'P-256', X: 'flat-x', Y: 'flat-y' }),
      RESULTS_URL,
    );

    expect(echo.sdkEphemeralPublicKey).toEqual({ kty: 'EC', crv: 'P-256', x: 'flat-x', y: 'flat-y' });
  });
});
