import { ApiProperty } from '@nestjs/swagger';

/**
 * Response for GET /health endpoint
 */
export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall health status',
    example: 'ok',
    enum: ['ok', 'error'],
  })
  status!: string;

  @ApiProperty({
    description: 'Detailed information about each health indicator when healthy',
    example: {
      server: { status: 'up' },
      signing: { status: 'up', mode: 'signed', subject: 'CN=mock-acs.test', daysUntilExpiry: 364 },
      transactions: { status: 'up', active: 2, stored: 3 },
    },
    required: false,
  })
  info?: Record<string, unknown>;

  @ApiProperty({
    description: 'Error information if health check failed',
    required: false,
  })
  error?: Record<string, unknown>;

  @ApiProperty({
    description: 'Detailed health check results for all indicators',
    example: {
      server: { status: 'up' },
      signing: { status: 'up', mode: 'fallback', reason: 'Cannot read certificate certs/acs-cert.pem: ENOENT' },
      transactions: { status: 'up', active: 0, stored: 0 },
    },
  })
  details!: Record<string, unknown>;
}
