import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { TransactionStoreHealthIndicator } from './transaction.health';
import { CertificateHealthIndicator } from '../certificate/certificate.health';
import { HealthResponseDto } from './dto/health-response.dto';

/**
 * Controller for handling health checks.
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly certificate: CertificateHealthIndicator,
    private readonly transactions: TransactionStoreHealthIndicator,
  ) {}

  /**
   * Performs a health check.
   * @returns A promise that resolves to the health check result.
   */
  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Application Health Status',
    description:
      'Reports the server, the ACS signing mode (signed or static fallback) and the transaction store. Fallback signing is reported as up.',
  })
  @ApiResponse({
    status: 200,
    description: 'The application is healthy. See the response body for detailed status of each component.',
    type: HealthResponseDto,
  })
  @ApiResponse({
    status: 503,
    description: 'The application is unhealthy. One or more health checks failed.',
    type: HealthResponseDto,
  })
  check() {
    return this.health.check([
      () => Promise.resolve({ server: { status: 'up' as const } }),
      () => Promise.resolve(this.certificate.isHealthy('signing')),
      () => this.transactions.isHealthy('transactions'),
    ]);
  }
}
