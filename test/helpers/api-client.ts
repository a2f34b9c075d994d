import request from 'supertest';
import type { App } from 'supertest/types';
import type { AuthenticateRequestDto } from '../../src/three-ds/dto/authenticate-request.dto';
import type { ResultsRequestDto } from '../../src/three-ds/dto/results.dto';

/**
 * Thin supertest wrapper over the 3DS Server and ACS routes.
 */
export class ApiClient {
  private readonly http: ReturnType<typeof request>;

  constructor(server: App) {
    this.http = request(server);
  }

  get(path: string) {
    return this.http.get(path);
  }

  post(path: string) {
    return this.http.post(path);
  }

  version(cardNumber: string) {
    return this.post('/3ds/version').send({ cardNumber });
  }

  authenticate(body: AuthenticateRequestDto) {
    return this.post('/3ds/authenticate').send(body);
  }

  results(body: ResultsRequestDto) {
    return this.post('/3ds/results').send(body);
  }

  final(threeDsServerTransId: string) {
    return this.post('/3ds/final').send({ threeDsServerTransId });
  }

  /** Posts a compact JWE the way the device SDKs do. */
  challenge(compactJwe: string, contentType = 'application/jose') {
    return this.post('/challenge').set('Content-Type', contentType).send(compactJwe);
  }

  triggerOtp(creq: string, redirectUrl?: string) {
    const path = redirectUrl
      ? `/processor/mock/acs/trigger-otp?redirectUrl=${encodeURIComponent(redirectUrl)}`
      : '/processor/mock/acs/trigger-otp';
    return this.post(path).type('form').send({ creq });
  }

  /** `path` is the form action, query string included. */
  verifyOtp(path: string, otp: string, threeDSServerTransID: string) {
    return this.post(path).type('form').send({ otp, threeDSServerTransID });
  }
}

export function createApiClient(server: App): ApiClient {
  return new ApiClient(server);
}

/**
 * Text of an `application/jose` response, which supertest may hand over
 * as a Buffer.
 */
export function readJoseBody(response: { body: unknown; text?: string }): string {
  if (Buffer.isBuffer(response.body)) {
    return response.body.toString('utf8');
  }
  return response.text ?? '';
}
