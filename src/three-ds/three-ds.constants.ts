export const MESSAGE_VERSION = '2.2.0';

/** deviceChannel of an app-based (SDK) transaction. */
export const DEVICE_CHANNEL_APP = '01';

export const CHALLENGE_IND_MANDATED = '04';
export const CHALLENGE_IND_NO_CHALLENGE = '05';

/** Card suffix that is challenged when the requestor expresses no preference. */
export const CHALLENGE_CARD_SUFFIX = '4001';

export const ACS_INFO_IND = ['01', '02'];

export const CARD_RANGES = {
  mastercard: { prefix: '515501', startRange: '5155010000000000', endRange: '5155019999999999' },
  fallback: { startRange: '4000000000000000', endRange: '4999999999999999' },
} as const;

export const ACS_PROFILES = {
  default: { acsOperatorId: 'MOCK_ACS', acsReferenceNumber: 'issuer1' },
  noChallenge: { acsOperatorId: 'MOCK_ACS_NEW', acsReferenceNumber: 'issuer2' },
} as const;

export const DS_REFERENCE_NUMBER = 'MOCK_DS';
export const ARES_ECI = '05';
export const ARES_AUTHENTICATION_TYPE = '02';
export const ARES_AUTHENTICATION_VALUE = 'QWErty123+/ABCD5678ghijklmn==';
export const CHALLENGE_WINDOW_SIZE = '01';

export const THREE_DS_SERVER_REF_NUMBER = '3DS_LOA_SER_JTPL_020200_00841';
export const THREE_DS_SERVER_OPERATOR_ID = '10073246';

export const MOBILE_ARES_EXTENSIONS = {
  threeDsRequestorAppUrlInd: 'N',
  acsRenderingType: { deviceUserInterfaceMode: '01', acsInterface: '01', acsUiTemplate: '01' },
  broadInfo: {
    category: '01',
    severity: '04',
    source: '03',
    recipients: ['02', '01', '03'],
    description: { message: 'TLS 1.x will be turned off starting summer 2019' },
    expDate: '20241231',
  },
  authenticationMethod: '02',
  transStatusReason: '15',
  deviceInfoRecognisedVersion: '1.3',
};

export const RESULTS_STATUS_RECEIVED = '01';

// Paths appended to the public base URL
export const MOBILE_CHALLENGE_PATH = '/challenge';
export const BROWSER_CHALLENGE_PATH = '/processor/mock/acs/trigger-otp';
export const BROWSER_VERIFY_PATH = '/processor/mock/acs/verify-otp';
export const RESULTS_PATH = '/3ds/results';
