import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { EphemeralKeyService } from '../crypto/ephemeral-key.service';
import { AcsSignedContentService } from '../crypto/acs-signed-content.service';
import { TransactionStorageService } from '../transaction/transaction-storage.service';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { buildAuthenticationRequestEcho, extractSdkEphemeralPublicKey } from './authentication-request.builder';
import { evaluateOtp, type OtpOutcome } from './authentication-value';
import {
  ACS_INFO_IND,
  ACS_PROFILES,
  ARES_AUTHENTICATION_TYPE,
  ARES_AUTHENTICATION_VALUE,
  ARES_ECI,
  BROWSER_CHALLENGE_PATH,
  CARD_RANGES,
  CHALLENGE_CARD_SUFFIX,
  CHALLENGE_IND_MANDATED,
  CHALLENGE_IND_NO_CHALLENGE,
  CHALLENGE_WINDOW_SIZE,
  DEVICE_CHANNEL_APP,
  DS_REFERENCE_NUMBER,
  MESSAGE_VERSION,
  MOBILE_ARES_EXTENSIONS,
  MOBILE_CHALLENGE_PATH,
  RESULTS_PATH,
  RESULTS_STATUS_RECEIVED,
} from './three-ds.constants';
import type {
  AuthenticateRequestDto,
  AuthenticateResponseDto,
  AuthenticationResponseDto,
  ChallengeRequestDto,
  FinalRequestDto,
  FinalResponseDto,
  ResultsRequestDto,
  ResultsResponseDto,
  VersionRequestDto,
  VersionResponseDto,
} from './dto';
import type { TransactionRecord } from '../transaction/interfaces';
import type { EphemeralKeyPair } from '../crypto/interfaces';

/**
 * `5155010000004001` → `5155****4001`
 */
export function maskCardNumber(cardNumber: string): string {
  if (cardNumber.length < 8) {
    return '****';
  }
  return `${cardNumber.slice(0, 4)}****${cardNumber.slice(-4)}`;
}

/**
 * `04` always challenges, `05` never does; otherwise cards ending in 4001
 * are challenged.
 */
export function shouldChallenge(challengeInd: string, cardNumber: string): boolean {
  if (challengeInd === CHALLENGE_IND_MANDATED) {
    return true;
  }
  if (challengeInd === CHALLENGE_IND_NO_CHALLENGE) {
    return false;
  }
  return cardNumber.endsWith(CHALLENGE_CARD_SUFFIX);
}

@Injectable()
export class ThreeDsService {
  private readonly logger = new Logger(ThreeDsService.name);
  private readonly publicBaseUrl: string;

  constructor(
    private readonly transactionStorage: TransactionStorageService,
    private readonly ephemeralKeyService: EphemeralKeyService,
    private readonly acsSignedContentService: AcsSignedContentService,
    private readonly metricsService: MetricsService,
    configService: ConfigService,
  ) {
    this.publicBaseUrl = configService.get<string>('tds.server.publicBaseUrl', 'http://127.0.0.1:8080');
  }

  /**
   * Open a transaction and return the card range the mock ACS serves.
   */
  getVersion(request: VersionRequestDto): VersionResponseDto {
    this.metricsService.increment(METRIC_PATHS.VERSION_REQUESTS_TOTAL);

    const range = request.cardNumber.startsWith(CARD_RANGES.mastercard.prefix)
      ? CARD_RANGES.mastercard
      : CARD_RANGES.fallback;

    const threeDsServerTransId = randomUUID();
    this.logger.debug(`Version lookup for ${maskCardNumber(request.cardNumber)} -> ${threeDsServerTransId}`);

    return {
      threeDsServerTransId,
      cardRanges: [
        {
          acsInfoInd: [...ACS_INFO_IND],
          startRange: range.startRange,
          acsEndProtocolVersion: MESSAGE_VERSION,
          acsStartProtocolVersion: MESSAGE_VERSION,
          endRange: range.endRange,
        },
      ],
    };
  }

  /**
   * Decide the flow for an AReq, store the transaction and build the ARes.
   *
   * @throws {BadRequestException} If an app-channel AReq has no sdkTransId
   * @throws {KeyGenerationFailureError} If the ACS ephemeral key cannot be generated
   */
  async authenticate(request: AuthenticateRequestDto): Promise<AuthenticateResponseDto> {
    this.metricsService.increment(METRIC_PATHS.AUTH_REQUESTS_TOTAL);

    const threeDsServerTransId = request.threeDsServerTransId;
    const isMobile = request.deviceChannel === DEVICE_CHANNEL_APP;
    const challengeInd = request.threeDsRequestor.threeDsRequestorChallengeInd;
    const cardNumber = request.cardholderAccount.acctNumber;

    if (isMobile && !request.sdkTransId) {
      this.metricsService.increment(METRIC_PATHS.AUTH_REJECTED_TOTAL);
      this.logger.warn(`Rejected app-channel AReq without sdkTransId: ${threeDsServerTransId}`);
      throw new BadRequestException({ error: 'sdkTransId is required for mobile flows (deviceChannel=01)' });
    }

    const challenge = shouldChallenge(challengeInd, cardNumber);
    const transStatus = challenge ? 'C' : 'Y';
    const acsChallengeMandated = challenge ? 'Y' : 'N';
    const profile = challengeInd === CHALLENGE_IND_NO_CHALLENGE ? ACS_PROFILES.noChallenge : ACS_PROFILES.default;
    const acsTransId = randomUUID();
    const dsTransId = randomUUID();

    this.logger.log(
      `AReq ${threeDsServerTransId}: ${isMobile ? 'app' : 'browser'} channel, challengeInd=${challengeInd}, ` +
        `card=${maskCardNumber(cardNumber)} -> ${challenge ? 'challenge' : 'frictionless'}`,
    );

    let ephemeralKeys: EphemeralKeyPair | undefined;
    let acsSignedContent: string | undefined;
    if (isMobile && challenge) {
      ephemeralKeys = this.ephemeralKeyService.generate();
      const signed = await this.acsSignedContentService.sign({
        acsTransId,
        acsReferenceNumber: profile.acsReferenceNumber,
        acsUrl: `${this.publicBaseUrl}${MOBILE_CHALLENGE_PATH}`,
        ephemeralPublicKey: ephemeralKeys,
      });
      acsSignedContent = signed.jwt;
      this.metricsService.increment(
        signed.kind === 'signed' ? METRIC_PATHS.SIGNING_SIGNED_TOTAL : METRIC_PATHS.SIGNING_FALLBACK_TOTAL,
      );
    }

    const sdkEphemeralPublicKey = isMobile ? extractSdkEphemeralPublicKey(request) : undefined;
    if (isMobile && !sdkEphemeralPublicKey) {
      this.logger.warn(`App-channel AReq ${threeDsServerTransId} carries no SDK ephemeral public key`);
    }

    const record: TransactionRecord = {
      threeDsServerTransId,
      acsTransId,
      dsTransId,
      sdkTransId: request.sdkTransId,
      deviceChannel: request.deviceChannel,
      authenticateRequest: request,
      ephemeralKeys,
      sdkEphemeralPublicKey,
      redirectUrl: request.merchant.notificationUrl,
      createdAt: new Date(),
    };
    this.transactionStorage.put(threeDsServerTransId, record);

    this.metricsService.increment(isMobile ? METRIC_PATHS.AUTH_MOBILE_TOTAL : METRIC_PATHS.AUTH_BROWSER_TOTAL);
    this.metricsService.increment(challenge ? METRIC_PATHS.AUTH_CHALLENGE_TOTAL : METRIC_PATHS.AUTH_FRICTIONLESS_TOTAL);

    const challengeRequest: ChallengeRequestDto = {
      messageType: 'CReq',
      threeDsServerTransId,
      acsTransId,
      challengeWindowSize: CHALLENGE_WINDOW_SIZE,
      messageVersion: MESSAGE_VERSION,
    };

    const browserAcsUrl = !isMobile && challenge ? `${this.publicBaseUrl}${BROWSER_CHALLENGE_PATH}` : undefined;

    const authenticationResponse: AuthenticationResponseDto = {
      acsOperatorID: profile.acsOperatorId,
      dsReferenceNumber: DS_REFERENCE_NUMBER,
      eci: ARES_ECI,
      dsTransId,
      messageType: 'ARes',
      threeDsServerTransId,
      acsTransId,
      acsChallengeMandated,
      authenticationType: ARES_AUTHENTICATION_TYPE,
      authenticationValue: ARES_AUTHENTICATION_VALUE,
      transStatus,
      messageVersion: MESSAGE_VERSION,
      acsReferenceNumber: profile.acsReferenceNumber,
      ...(isMobile
        ? {
            ...structuredClone(MOBILE_ARES_EXTENSIONS),
            sdkTransId: request.sdkTransId,
            ...(acsSignedContent ? { acsSignedContent } : {}),
          }
        : {}),
      ...(browserAcsUrl ? { acsUrl: browserAcsUrl } : {}),
    };

    return {
      purchaseDate: request.purchase.purchaseDate,
      ...(challenge
        ? { base64EncodedChallengeRequest: Buffer.from(JSON.stringify(challengeRequest)).toString('base64') }
        : {}),
      ...(browserAcsUrl ? { acsUrl: browserAcsUrl } : {}),
      threeDsServerTransId,
      authenticationResponse,
      challengeRequest,
      acsChallengeMandated,
      transStatus,
      authenticationRequest: buildAuthenticationRequestEcho(request, `${this.publicBaseUrl}${RESULTS_PATH}`),
    };
  }

  /**
   * Attach an RReq to its transaction.
   *
   * @throws {BadRequestException} If the transaction is unknown or expired
   */
  recordResults(request: ResultsRequestDto): ResultsResponseDto {
    const record = this.transactionStorage.get(request.threeDsServerTransId);
    if (!record) {
      throw new BadRequestException({ error: 'Transaction not found' });
    }

    this.transactionStorage.update(record.threeDsServerTransId, { ...record, resultsRequest: request });
    this.metricsService.increment(METRIC_PATHS.TRANSACTIONS_RESULTS_TOTAL);
    this.logger.log(`Results recorded for ${record.threeDsServerTransId}: transStatus=${request.transStatus}`);

    return this.buildResultsResponse(record);
  }

  /**
   * Evaluate an OTP entered in a challenge and record the outcome as an RReq.
   */
  completeChallenge(record: TransactionRecord, otp: string, messageVersion: string = MESSAGE_VERSION): OtpOutcome {
    const outcome = evaluateOtp(otp);
    this.metricsService.increment(
      outcome.transStatus === 'Y' ? METRIC_PATHS.CHALLENGE_OTP_SUCCESS_TOTAL : METRIC_PATHS.CHALLENGE_OTP_FAILURE_TOTAL,
    );

    this.recordResults({
      acsTransId: record.acsTransId,
      messageCategory: '01',
      eci: outcome.eci,
      messageType: 'RReq',
      acsRenderingType: { acsUiTemplate: '01', acsInterface: '01' },
      dsTransId: record.dsTransId,
      authenticationMethod: '02',
      authenticationType: '02',
      messageVersion,
      sdkTransId: record.sdkTransId,
      interactionCounter: '01',
      authenticationValue: outcome.authenticationValue,
      transStatus: outcome.transStatus,
      threeDsServerTransId: record.threeDsServerTransId,
    });

    return outcome;
  }

  /**
   * Final outcome of a transaction once results have been recorded.
   *
   * @throws {BadRequestException} If the transaction is unknown or has no results yet
   */
  getFinal(request: FinalRequestDto): FinalResponseDto {
    const record = this.transactionStorage.get(request.threeDsServerTransId);
    if (!record) {
      throw new BadRequestException({ error: 'Transaction not found' });
    }

    const results = record.resultsRequest;
    if (!results) {
      throw new BadRequestException({ error: 'Results not found for this transaction' });
    }

    return {
      eci: results.eci,
      authenticationValue: results.authenticationValue,
      threeDsServerTransId: record.threeDsServerTransId,
      resultsResponse: this.buildResultsResponse(record),
      resultsRequest: results,
      transStatus: results.transStatus,
    };
  }

  private buildResultsResponse(record: TransactionRecord): ResultsResponseDto {
    return {
      dsTransId: record.dsTransId,
      messageType: 'RRes',
      threeDsServerTransId: record.threeDsServerTransId,
      acsTransId: record.acsTransId,
      sdkTransId: record.sdkTransId ?? null,
      resultsStatus: RESULTS_STATUS_RECEIVED,
      messageVersion: MESSAGE_VERSION,
    };
  }
}
