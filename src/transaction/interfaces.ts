import type { EphemeralKeyPair, PeerPublicJwk } from '../crypto/interfaces';
import type { AuthenticateRequestDto } from '../three-ds/dto/authenticate-request.dto';
import type { ResultsRequestDto } from '../three-ds/dto/results.dto';

/**
 * State kept between /3ds/authenticate and the challenge, results and
 * final calls of one transaction.
 */
export interface TransactionRecord {
  threeDsServerTransId: string;
  acsTransId: string;
  dsTransId: string;
  sdkTransId?: string;
  deviceChannel: string;
  authenticateRequest: AuthenticateRequestDto;
  resultsRequest?: ResultsRequestDto;
  /** ACS side of the ECDH; only present for mobile challenges. */
  ephemeralKeys?: EphemeralKeyPair;
  sdkEphemeralPublicKey?: PeerPublicJwk;
  /** Browser redirect after the OTP page (merchant notification URL). */
  redirectUrl?: string;
  createdAt: Date;
}

export interface StoredTransaction {
  record: TransactionRecord;
  expiresAt: number;
}
