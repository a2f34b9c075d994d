import { Logger } from '@nestjs/common';
import type { TdsConfiguration } from './config.types';

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs the loaded configuration at startup. Key material paths are shown,
 * key material itself never is.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: TdsConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: ${config.server.host}:${config.server.port}`);
  summaryLogger.log(`Public Base URL: ${config.server.publicBaseUrl}`);
  summaryLogger.log(`Swagger UI: ${config.server.swaggerEnabled ? 'enabled' : 'disabled'}`);
  summaryLogger.log(
    `Transactions: TTL ${config.transaction.ttl}s, sweep every ${config.transaction.cleanupInterval}s`,
  );
  summaryLogger.log(`ACS Certificate: ${config.acs.certPath}`);
  summaryLogger.log(`ACS Private Key: ${config.acs.keyPath}`);
  summaryLogger.log(`Default Redirect URL: ${config.challenge.defaultRedirectUrl}`);
  summaryLogger.log(`Throttle: ${config.throttle.limit} requests / ${config.throttle.ttl}ms`);
}
/* c8 ignore stop */
