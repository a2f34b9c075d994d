import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { CertificateService } from './certificate.service';

/**
 * Reports which signing mode the ACS is in. Fallback is a supported mode,
 * so the indicator is always `up`.
 */
@Injectable()
export class CertificateHealthIndicator {
  /**
   * Constructor
   */
  constructor(
    private readonly certificateService: CertificateService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  /**
   * @param key - A key to represent this health indicator in the results.
   */
  isHealthy(key: string) {
    const status = this.certificateService.getStatus();
    const indicator = this.healthIndicatorService.check(key);

    if (status.mode === 'fallback') {
      return indicator.up({ mode: status.mode, reason: status.reason });
    }

    return indicator.up({
      mode: status.mode,
      subject: status.subject,
      expiresAt: status.expiresAt?.toISOString(),
      daysUntilExpiry: status.daysUntilExpiry,
    });
  }
}
