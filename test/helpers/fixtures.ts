import authenticateRequestFixture from '../fixtures/authenticate-request.json';
import type { AuthenticateRequestDto } from '../../src/three-ds/dto/authenticate-request.dto';
import type { TransactionRecord } from '../../src/transaction/interfaces';

/** Browser AReq for a card that is challenged by default. */
export function buildAuthenticateRequest(overrides: Partial<AuthenticateRequestDto> = {}): AuthenticateRequestDto {
  const base: AuthenticateRequestDto = structuredClone(authenticateRequestFixture);
  return { ...base, ...overrides };
}

/** Same AReq with a different challenge indicator and card number. */
export function withCard(
  request: AuthenticateRequestDto,
  acctNumber: string,
  challengeInd: string = request.threeDsRequestor.threeDsRequestorChallengeInd,
): AuthenticateRequestDto {
  return {
    ...request,
    cardholderAccount: { ...request.cardholderAccount, acctNumber },
    threeDsRequestor: { ...request.threeDsRequestor, threeDsRequestorChallengeInd: challengeInd },
  };
}

export function buildTransactionRecord(overrides: Partial<TransactionRecord> = {}): TransactionRecord {
  const authenticateRequest = buildAuthenticateRequest();
  return {
    threeDsServerTransId: authenticateRequest.threeDsServerTransId,
    acsTransId: '0b6a2f4e-8c1d-4e5f-9a7b-3c2d1e0f9a8b',
    dsTransId: 'c4d5e6f7-1a2b-4c3d-8e9f-0a1b2c3d4e5f',
    deviceChannel: authenticateRequest.deviceChannel,
    authenticateRequest,
    redirectUrl: authenticateRequest.merchant.notificationUrl,
    createdAt: new Date('2024-01-01T12:00:00.000Z'),
    ...overrides,
  };
}
