import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { MetricsService } from './metrics.service';
import { METRIC_PATHS } from './metrics.constants';
import { MetricsResponseDto } from './dto/metrics-response.dto';
import { TransactionStorageService } from '../transaction/transaction-storage.service';
import type { Metrics } from './interfaces';

@ApiTags('Metrics')
@Controller('metrics')
export class MetricsController {
  constructor(
    private readonly metricsService: MetricsService,
    private readonly transactionStorage: TransactionStorageService,
  ) {}

  /**
   * GET /metrics
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Get Application Metrics',
    description: 'Returns counters for version lookups, authentications, challenges, signing and live transactions.',
  })
  @ApiResponse({
    status: 200,
    description: 'Metrics retrieved successfully.',
    type: MetricsResponseDto,
  })
  getMetrics(): Readonly<Metrics> {
    this.metricsService.set(METRIC_PATHS.TRANSACTIONS_ACTIVE_TOTAL, this.transactionStorage.countActive());
    return this.metricsService.getMetrics();
  }
}
