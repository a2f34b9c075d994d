import { BadRequestException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFileSync } from 'fs';
import { join } from 'path';
import { KeyDerivationService } from '../crypto/key-derivation.service';
import { JweService } from '../crypto/jwe/jwe.service';
import { readJweHeader } from '../crypto/jwe/jwe-compact';
import { detectPlatform } from '../crypto/platform';
import { ThreeDsCryptoError } from '../crypto/crypto.errors';
import type { DerivedKeyMaterial, JweHeader, Platform } from '../crypto/interfaces';
import { TransactionStorageService } from '../transaction/transaction-storage.service';
import type { TransactionRecord } from '../transaction/interfaces';
import { ThreeDsService } from '../three-ds/three-ds.service';
import { BROWSER_VERIFY_PATH, MESSAGE_VERSION } from '../three-ds/three-ds.constants';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_PATHS } from '../metrics/metrics.constants';
import { DEFAULT_REDIRECT_URL } from '../config/config.constants';
import { isRecord } from '../shared/object.utils';
import { getErrorMessage } from '../shared/error.utils';
import { ChallengeException } from './challenge.errors';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const TEMPLATE_PATH = join(__dirname, '..', '..', 'templates', 'acs-challenge.html');

const INITIAL_SDK_COUNTER = '000';
const OTP_SDK_COUNTER = '001';

export interface OtpFormFields {
  otp: string;
  threeDSServerTransID: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * ACS side of the challenge: the encrypted app channel on /challenge and
 * the browser OTP page.
 */
@Injectable()
export class ChallengeService {
  private readonly logger = new Logger(ChallengeService.name);
  private readonly publicBaseUrl: string;
  private readonly defaultRedirectUrl: string;
  private readonly template: string;

  constructor(
    private readonly transactionStorage: TransactionStorageService,
    private readonly keyDerivationService: KeyDerivationService,
    private readonly jweService: JweService,
    private readonly threeDsService: ThreeDsService,
    private readonly metricsService: MetricsService,
    configService: ConfigService,
  ) {
    this.publicBaseUrl = configService.get<string>('tds.server.publicBaseUrl', 'http://127.0.0.1:8080');
    this.defaultRedirectUrl = configService.get<string>('tds.challenge.defaultRedirectUrl', DEFAULT_REDIRECT_URL);
    this.template = readFileSync(TEMPLATE_PATH, 'utf8');
  }

  /**
   * Decrypt a CReq sent by a device SDK, advance the challenge and return
   * the CRes encrypted under the same derived key.
   *
   * @param body - Compact JWE whose `kid` is the acsTransID
   * @returns Compact JWE carrying the CRes
   * @throws {ChallengeException} 400 on a malformed or undecryptable request, 404 for an unknown acsTransID
   */
  handleAppChallenge(body: string): string {
    this.metricsService.increment(METRIC_PATHS.CHALLENGE_MOBILE_REQUESTS_TOTAL);
    const compact = body.trim();

    if (compact.startsWith('{') && compact.endsWith('}') && this.isJson(compact)) {
      this.logger.warn('Challenge request body is JSON, not a JWE');
      throw this.reject('Received JSON error response instead of JWE');
    }

    if (compact.split('.').length !== 5) {
      throw this.reject('Invalid JWE format');
    }

    const header = this.readHeader(compact);
    const acsTransId = header.kid;
    if (acsTransId === undefined) {
      throw this.reject('Missing kid in JWE header');
    }
    if (!UUID_PATTERN.test(acsTransId)) {
      throw this.reject(`Invalid kid format: ${acsTransId}`);
    }

    // acsTransIDs are issued lowercase; the kid is echoed as sent
    const record = this.transactionStorage.findByAcsTransId(acsTransId.toLowerCase());
    if (!record) {
      this.logger.warn(`No transaction for acsTransID ${acsTransId}`);
      throw new ChallengeException(HttpStatus.NOT_FOUND, 'Transaction not found');
    }

    const derived = this.deriveKey(record, header);
    const creq = this.decryptRequest(compact, derived);

    const cres = this.nextChallengeResponse(record, creq);
    this.logger.log(
      `CRes for ${record.threeDsServerTransId} (${derived.platform}): challengeCompletionInd=${String(cres.challengeCompletionInd)}`,
    );
    return this.jweService.encrypt(cres, { kid: acsTransId }, derived);
  }

  /**
   * Render the browser OTP page for a CReq posted by the 3DS requestor.
   *
   * @param creq - CReq as JSON (not base64)
   * @param redirectUrl - Overrides the redirect stored on the transaction
   * @throws {BadRequestException} If `creq` is not a JSON CReq
   */
  renderOtpForm(creq: string, redirectUrl?: string): string {
    const threeDsServerTransId = this.readChallengeRequestId(creq);
    this.metricsService.increment(METRIC_PATHS.CHALLENGE_BROWSER_FORMS_TOTAL);

    const target =
      redirectUrl ?? this.transactionStorage.get(threeDsServerTransId)?.redirectUrl ?? this.defaultRedirectUrl;
    const payEndpoint = `${this.publicBaseUrl}${BROWSER_VERIFY_PATH}?redirectUrl=${encodeURIComponent(target)}`;

    this.logger.debug(`OTP form for ${threeDsServerTransId}, redirecting to ${target}`);

    return this.template
      .replaceAll('{{FALLBACK_REDIRECT_URL}}', () => escapeHtml(this.publicBaseUrl))
      .replaceAll('{{THREE_DS_SERVER_TRANS_ID}}', () => escapeHtml(threeDsServerTransId))
      .replaceAll('{{PAY_ENDPOINT}}', () => escapeHtml(payEndpoint));
  }

  /**
   * Check a browser OTP and build the redirect back to the merchant.
   * Every failure still redirects, with `transStatus=U`.
   *
   * @returns Location for the 302
   */
  verifyOtp(form: OtpFormFields, redirectUrl: string = this.defaultRedirectUrl): string {
    const errorRedirect = `${redirectUrl}?transStatus=U&error=processing_error`;

    const threeDsServerTransId = form.threeDSServerTransID;
    if (!UUID_PATTERN.test(threeDsServerTransId)) {
      this.logger.warn(`Invalid transaction ID on OTP form: ${threeDsServerTransId}`);
      return errorRedirect;
    }

    const record = this.transactionStorage.get(threeDsServerTransId);
    if (!record) {
      this.logger.warn(`OTP submitted for unknown transaction ${threeDsServerTransId}`);
      return errorRedirect;
    }

    try {
      const outcome = this.threeDsService.completeChallenge(record, form.otp);
      this.logger.log(`Browser OTP for ${threeDsServerTransId}: transStatus=${outcome.transStatus}`);

      const params = [
        `transStatus=${outcome.transStatus}`,
        `threeDSServerTransID=${threeDsServerTransId}`,
        `eci=${outcome.eci}`,
        `authenticationValue=${encodeURIComponent(outcome.authenticationValue)}`,
      ].join('&');
      return `${redirectUrl}?${params}`;
    } catch (error) {
      this.logger.error(`Failed to record browser challenge results: ${getErrorMessage(error)}`);
      return errorRedirect;
    }
  }

  private nextChallengeResponse(record: TransactionRecord, creq: Record<string, unknown>): Record<string, unknown> {
    const sdkCounter = typeof creq.sdkCounterStoA === 'string' ? creq.sdkCounterStoA : 'unknown';
    const sdkTransID = record.sdkTransId ?? '';

    if (creq.challengeDataEntry === undefined) {
      if (sdkCounter !== INITIAL_SDK_COUNTER) {
        this.logger.warn(`Unexpected sdkCounterStoA ${sdkCounter} on initial CReq (expected ${INITIAL_SDK_COUNTER})`);
      }
      return {
        acsTransID: record.acsTransId,
        acsCounterAtoS: '000',
        acsUiType: '01',
        challengeCompletionInd: 'N',
        challengeInfoHeader: 'Authentication Required',
        challengeInfoLabel: 'Enter OTP:',
        messageType: 'CRes',
        messageVersion: MESSAGE_VERSION,
        sdkTransID,
        threeDSServerTransID: record.threeDsServerTransId,
        submitAuthenticationLabel: 'Submit',
      };
    }

    if (sdkCounter !== OTP_SDK_COUNTER) {
      this.logger.warn(`Unexpected sdkCounterStoA ${sdkCounter} on OTP submission (expected ${OTP_SDK_COUNTER})`);
    }

    const otp = typeof creq.challengeDataEntry === 'string' ? creq.challengeDataEntry : '';
    const messageVersion = typeof creq.messageVersion === 'string' ? creq.messageVersion : MESSAGE_VERSION;
    const outcome = this.threeDsService.completeChallenge(record, otp, messageVersion);

    return {
      acsCounterAtoS: '001',
      acsTransID: record.acsTransId,
      challengeCompletionInd: 'Y',
      messageType: 'CRes',
      messageVersion,
      sdkTransID,
      threeDSServerTransID: record.threeDsServerTransId,
      transStatus: outcome.transStatus,
    };
  }

  private readHeader(compact: string): JweHeader {
    try {
      return readJweHeader(compact);
    } catch (error) {
      if (error instanceof ThreeDsCryptoError) {
        throw this.reject(`Invalid JWE header: ${error.message}`);
      }
      throw error;
    }
  }

  private deriveKey(record: TransactionRecord, header: JweHeader): DerivedKeyMaterial {
    const { sdkEphemeralPublicKey, ephemeralKeys } = record;
    if (!sdkEphemeralPublicKey || !ephemeralKeys) {
      throw this.reject('Missing ephemeral keys for ECDH');
    }

    let platform: Platform;
    try {
      platform = detectPlatform(header);
    } catch (error) {
      this.logger.warn(getErrorMessage(error));
      throw this.reject('Unsupported encryption algorithm');
    }

    try {
      return this.keyDerivationService.deriveChallengeKey(sdkEphemeralPublicKey, ephemeralKeys, platform);
    } catch (error) {
      if (error instanceof ThreeDsCryptoError) {
        this.logger.warn(`Key derivation failed for ${record.threeDsServerTransId}: ${error.message}`);
        throw this.reject('Failed to derive shared key');
      }
      throw error;
    }
  }

  private decryptRequest(compact: string, derived: DerivedKeyMaterial): Record<string, unknown> {
    try {
      return this.jweService.decrypt(compact, derived);
    } catch (error) {
      if (error instanceof ThreeDsCryptoError) {
        this.logger.warn(`CReq decryption failed (${error.code}): ${error.message}`);
        throw this.reject('Failed to decrypt challenge request');
      }
      throw error;
    }
  }

  private readChallengeRequestId(creq: string): string {
    let parsed: unknown;
    try {
      parsed = JSON.parse(creq);
    } catch {
      throw new BadRequestException({ error: 'Invalid JSON in challenge request' });
    }

    const id = isRecord(parsed) ? parsed.threeDsServerTransId : undefined;
    if (typeof id !== 'string' || !UUID_PATTERN.test(id)) {
      throw new BadRequestException({ error: 'Invalid JSON in challenge request' });
    }
    return id;
  }

  private isJson(value: string): boolean {
    try {
      JSON.parse(value);
      return true;
    } catch {
      return false;
    }
  }

  private reject(description: string): ChallengeException {
    this.metricsService.increment(METRIC_PATHS.CHALLENGE_DECRYPT_FAILURES_TOTAL);
    return new ChallengeException(HttpStatus.BAD_REQUEST, description);
  }
}
