import { ApiProperty } from '@nestjs/swagger';

export class VersionMetricsDto {
  @ApiProperty({ description: 'Card range lookups served', example: 12 })
  requests_total!: number;
}

export class AuthenticationMetricsDto {
  @ApiProperty({ description: 'AReqs received', example: 10 })
  requests_total!: number;

  @ApiProperty({ description: 'Browser-channel AReqs stored', example: 6 })
  browser_total!: number;

  @ApiProperty({ description: 'App-channel AReqs stored', example: 4 })
  mobile_total!: number;

  @ApiProperty({ description: 'Transactions answered with transStatus Y', example: 3 })
  frictionless_total!: number;

  @ApiProperty({ description: 'Transactions answered with transStatus C', example: 7 })
  challenge_total!: number;

  @ApiProperty({ description: 'AReqs rejected before a transaction was stored', example: 0 })
  rejected_total!: number;
}

export class ChallengeMetricsDto {
  @ApiProperty({ description: 'Encrypted CReqs received on /challenge', example: 8 })
  mobile_requests_total!: number;

  @ApiProperty({ description: 'Browser OTP forms rendered', example: 3 })
  browser_forms_total!: number;

  @ApiProperty({ description: 'CReqs that could not be decrypted or routed', example: 1 })
  decrypt_failures_total!: number;

  @ApiProperty({ description: 'OTP submissions accepted', example: 5 })
  otp_success_total!: number;

  @ApiProperty({ description: 'OTP submissions refused', example: 1 })
  otp_failure_total!: number;
}

export class SigningMetricsDto {
  @ApiProperty({ description: 'ACS signed content produced with the loaded key', example: 4 })
  signed_total!: number;

  @ApiProperty({ description: 'ACS signed content replaced by the static fallback', example: 0 })
  fallback_total!: number;
}

export class TransactionMetricsDto {
  @ApiProperty({ description: 'Live transactions in the store', example: 2 })
  active_total!: number;

  @ApiProperty({ description: 'RReqs recorded', example: 5 })
  results_total!: number;
}

export class ServerMetricsDto {
  @ApiProperty({ description: 'Process uptime in seconds', example: 3600 })
  uptime_seconds!: number;
}

/**
 * Response for GET /metrics
 */
export class MetricsResponseDto {
  @ApiProperty({ type: VersionMetricsDto }) versions!: VersionMetricsDto;
  @ApiProperty({ type: AuthenticationMetricsDto }) authentication!: AuthenticationMetricsDto;
  @ApiProperty({ type: ChallengeMetricsDto }) challenge!: ChallengeMetricsDto;
  @ApiProperty({ type: SigningMetricsDto }) signing!: SigningMetricsDto;
  @ApiProperty({ type: TransactionMetricsDto }) transactions!: TransactionMetricsDto;
  @ApiProperty({ type: ServerMetricsDto }) server!: ServerMetricsDto;
}
