import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TerminusModule } from '@nestjs/terminus';
import { CertificateService } from './certificate.service';
import { CertificateHealthIndicator } from './certificate.health';
import { CERTIFICATE_CONFIG } from './certificate.tokens';
import { DEFAULT_ACS_CERT_PATH, DEFAULT_ACS_KEY_PATH } from '../config/config.constants';
import type { CertificateConfig } from './interfaces';

/**
 * Factory provider for CertificateConfig.
 * Centralizes the logic for loading certificate configuration from ConfigService.
 */
const certificateConfigProvider = {
  provide: CERTIFICATE_CONFIG,
  useFactory: (configService: ConfigService): CertificateConfig => {
    const config = configService.get<CertificateConfig>('tds.acs');
    return config ?? ({ certPath: DEFAULT_ACS_CERT_PATH, keyPath: DEFAULT_ACS_KEY_PATH } satisfies CertificateConfig);
  },
  inject: [ConfigService],
};

/**
 * ACS signing key material and its health indicator.
 */
@Module({
  imports: [TerminusModule],
  providers: [certificateConfigProvider, CertificateService, CertificateHealthIndicator],
  exports: [CertificateService, CertificateHealthIndicator],
})
export class CertificateModule {}
