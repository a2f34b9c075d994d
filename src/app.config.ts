import { registerAs } from '@nestjs/config';
import * as process from 'process';
import {
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  DEFAULT_TRANSACTION_TTL,
  DEFAULT_TRANSACTION_CLEANUP_INTERVAL,
  DEFAULT_ACS_CERT_PATH,
  DEFAULT_ACS_KEY_PATH,
  DEFAULT_REDIRECT_URL,
  DEFAULT_THROTTLE_TTL,
  DEFAULT_THROTTLE_LIMIT,
} from './config/config.constants';
import {
  parseNumberWithDefault,
  parseOptionalBoolean,
  parseStringWithDefault,
  parseUrl,
} from './config/config.parsers';
import { validatePositive } from './config/config.validators';
import type { TdsConfiguration } from './config/config.types';

/**
 * Build Server Configuration
 *
 * Optional environment variables:
 * - TDS_SERVER_HOST: Host advertised in generated URLs (default: 127.0.0.1)
 * - TDS_SERVER_PORT: HTTP port (default: 8080)
 * - TDS_PUBLIC_BASE_URL: Base for the ACS and challenge URLs handed to clients
 *   (default: http://{host}:{port})
 * - TDS_SWAGGER_ENABLED: Serve the OpenAPI UI at /api-docs (default: true in development)
 *
 * @throws {Error} If the port is 0 or the base URL is not http(s)
 */
function buildServerConfig(environment: string): TdsConfiguration['server'] {
  const host = parseStringWithDefault(process.env.TDS_SERVER_HOST, DEFAULT_SERVER_HOST);
  const port = validatePositive(
    'TDS_SERVER_PORT',
    parseNumberWithDefault(process.env.TDS_SERVER_PORT, DEFAULT_SERVER_PORT),
  );
  const publicBaseUrl = parseUrl(
    'TDS_PUBLIC_BASE_URL',
    parseStringWithDefault(process.env.TDS_PUBLIC_BASE_URL, `http://${host}:${port}`),
  );

  const swaggerEnabled = parseOptionalBoolean(process.env.TDS_SWAGGER_ENABLED, environment === 'development');

  return { host, port, publicBaseUrl, swaggerEnabled };
}

/**
 * Build Transaction Store Configuration
 *
 * Optional environment variables:
 * - TDS_TRANSACTION_TTL: Seconds a transaction stays retrievable (default: 1200)
 * - TDS_TRANSACTION_CLEANUP_INTERVAL: Seconds between expiry sweeps (default: 60)
 */
function buildTransactionConfig(): TdsConfiguration['transaction'] {
  return {
    ttl: validatePositive(
      'TDS_TRANSACTION_TTL',
      parseNumberWithDefault(process.env.TDS_TRANSACTION_TTL, DEFAULT_TRANSACTION_TTL),
    ),
    cleanupInterval: validatePositive(
      'TDS_TRANSACTION_CLEANUP_INTERVAL',
      parseNumberWithDefault(process.env.TDS_TRANSACTION_CLEANUP_INTERVAL, DEFAULT_TRANSACTION_CLEANUP_INTERVAL),
    ),
  };
}

/**
 * Build ACS Key Material Configuration
 *
 * The certificate is embedded as `x5c` in the ACS signed content and the RSA
 * key signs it. Missing files are not a configuration error: the signer
 * falls back to static content.
 *
 * Optional environment variables:
 * - TDS_ACS_CERT_PATH: PEM certificate (default: certs/acs-cert.pem)
 * - TDS_ACS_KEY_PATH: PEM RSA private key, PKCS#1 or PKCS#8 (default: certs/acs-private-key.pem)
 */
function buildAcsConfig(): TdsConfiguration['acs'] {
  return {
    certPath: parseStringWithDefault(process.env.TDS_ACS_CERT_PATH, DEFAULT_ACS_CERT_PATH),
    keyPath: parseStringWithDefault(process.env.TDS_ACS_KEY_PATH, DEFAULT_ACS_KEY_PATH),
  };
}

function buildChallengeConfig(): TdsConfiguration['challenge'] {
  return {
    defaultRedirectUrl: parseUrl(
      'TDS_DEFAULT_REDIRECT_URL',
      parseStringWithDefault(process.env.TDS_DEFAULT_REDIRECT_URL, DEFAULT_REDIRECT_URL),
    ),
  };
}

/**
 * Build Throttle Configuration
 *
 * Optional environment variables:
 * - TDS_THROTTLE_TTL: Time window in milliseconds (default: 60000)
 * - TDS_THROTTLE_LIMIT: Maximum requests per window (default: 1000)
 */
function buildThrottleConfig(): TdsConfiguration['throttle'] {
  return {
    ttl: parseNumberWithDefault(process.env.TDS_THROTTLE_TTL, DEFAULT_THROTTLE_TTL),
    limit: parseNumberWithDefault(process.env.TDS_THROTTLE_LIMIT, DEFAULT_THROTTLE_LIMIT),
  };
}

/**
 * Register Config TDS
 */
export default registerAs('tds', (): TdsConfiguration => {
  const environment = parseStringWithDefault(process.env.NODE_ENV, 'production');

  return {
    environment,
    server: buildServerConfig(environment),
    transaction: buildTransactionConfig(),
    acs: buildAcsConfig(),
    challenge: buildChallengeConfig(),
    throttle: buildThrottleConfig(),
  };
});
