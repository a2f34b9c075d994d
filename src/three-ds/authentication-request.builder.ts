import type { AuthenticateRequestDto } from './dto/authenticate-request.dto';
import type { PeerPublicJwk } from '../crypto/interfaces';
import {
  MESSAGE_VERSION,
  THREE_DS_SERVER_OPERATOR_ID,
  THREE_DS_SERVER_REF_NUMBER,
} from './three-ds.constants';

/**
 * SDK ephemeral public key from an AReq, nested or as top-level
 * `Kty`/`Crv`/`X`/`Y`. The nested form wins when both are present.
 */
export function extractSdkEphemeralPublicKey(request: AuthenticateRequestDto): PeerPublicJwk | undefined {
  const nested = request.sdkEphemeralPublicKey;
  if (nested) {
    return { kty: nested.kty, crv: nested.crv, x: nested.x, y: nested.y };
  }

  const { Kty, Crv, X, Y } = request;
  if (Kty !== undefined && Crv !== undefined && X !== undefined && Y !== undefined) {
    return { kty: Kty, crv: Crv, x: X, y: Y };
  }
  return undefined;
}

/**
 * The AReq as a 3DS Server would forward it to the DS: EMVCo field names,
 * flattened cardholder data, numeric purchase fields as strings.
 */
export function buildAuthenticationRequestEcho(
  request: AuthenticateRequestDto,
  threeDsServerUrl: string,
): Record<string, unknown> {
  const { cardholder, cardholderAccount, purchase, merchant, acquirer, threeDsRequestor } = request;

  const echo: Record<string, unknown> = {
    messageType: 'AReq',
    messageVersion: MESSAGE_VERSION,
    messageCategory: request.messageCategory,
    deviceChannel: request.deviceChannel,
    threeDSServerTransID: request.threeDsServerTransId,
    threeDSServerRefNumber: THREE_DS_SERVER_REF_NUMBER,
    threeDSServerOperatorID: THREE_DS_SERVER_OPERATOR_ID,
    threeDSServerURL: threeDsServerUrl,
    threeDSCompInd: request.threeDsCompInd,
    threeDSRequestorID: merchant.threeDsRequestorId,
    threeDSRequestorName: merchant.threeDsRequestorName,
    threeDSRequestorURL: merchant.notificationUrl,
    threeDSRequestorAuthenticationInd: threeDsRequestor.threeDsRequestorAuthenticationInd,
    threeDSRequestorAuthenticationInfo: {
      threeDSReqAuthMethod: threeDsRequestor.threeDsRequestorAuthenticationInfo.threeDsReqAuthMethod,
      threeDSReqAuthTimestamp: threeDsRequestor.threeDsRequestorAuthenticationInfo.threeDsReqAuthTimestamp,
    },
    threeDSRequestorChallengeInd: threeDsRequestor.threeDsRequestorChallengeInd,
    notificationURL: merchant.notificationUrl,
    acquirerBIN: acquirer.acquirerBin,
    acquirerMerchantID: acquirer.acquirerMerchantId,
    merchantName: merchant.merchantName,
    merchantCountryCode: merchant.merchantCountryCode,
    mcc: merchant.mcc,
    acctType: cardholderAccount.acctType,
    acctNumber: cardholderAccount.acctNumber,
    cardExpiryDate: cardholderAccount.cardExpiryDate,
    cardSecurityCode: cardholderAccount.cardSecurityCode,
    cardholderName: cardholder.cardholderName,
    email: cardholder.email,
    addrMatch: cardholder.addrMatch,
    billAddrLine1: cardholder.billAddrLine1,
    billAddrLine2: cardholder.billAddrLine2,
    billAddrLine3: cardholder.billAddrLine3,
    billAddrCity: cardholder.billAddrCity,
    billAddrPostCode: cardholder.billAddrPostCode,
    billAddrCountry: cardholder.billAddrCountry,
    shipAddrLine1: cardholder.shipAddrLine1,
    shipAddrLine2: cardholder.shipAddrLine2,
    shipAddrLine3: cardholder.shipAddrLine3,
    shipAddrCity: cardholder.shipAddrCity,
    shipAddrPostCode: cardholder.shipAddrPostCode,
    shipAddrCountry: cardholder.shipAddrCountry,
    homePhone: { subscriber: cardholder.homePhone.subscriber, cc: cardholder.homePhone.cc },
    mobilePhone: { subscriber: cardholder.mobilePhone.subscriber, cc: cardholder.mobilePhone.cc },
    workPhone: { subscriber: cardholder.workPhone.subscriber, cc: cardholder.workPhone.cc },
    purchaseAmount: String(purchase.purchaseAmount),
    purchaseCurrency: purchase.purchaseCurrency,
    purchaseExponent: String(purchase.purchaseExponent),
    purchaseDate: purchase.purchaseDate,
    recurringExpiry: purchase.recurringExpiry,
    recurringFrequency: String(purchase.recurringFrequency),
    transType: purchase.transType,
    deviceRenderOptions: {
      sdkUiType: request.deviceRenderOptions.sdkUiType,
      sdkInterface: request.deviceRenderOptions.sdkInterface,
    },
  };

  const browser = request.browserInformation;
  if (browser) {
    Object.assign(echo, {
      browserAcceptHeader: browser.browserAcceptHeader,
      browserIP: browser.browserIP,
      browserLanguage: browser.browserLanguage,
      browserColorDepth: browser.browserColorDepth,
      browserScreenHeight: String(browser.browserScreenHeight),
      browserScreenWidth: String(browser.browserScreenWidth),
      browserTZ: String(browser.browserTZ),
      browserUserAgent: browser.browserUserAgent,
      browserJavaEnabled: browser.browserJavaEnabled,
      browserJavascriptEnabled: browser.browserJavascriptEnabled,
    });
  }

  const sdkKey = extractSdkEphemeralPublicKey(request);
  if (sdkKey) {
    echo.sdkEphemeralPublicKey = sdkKey;
  }

  return echo;
}
