import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { TransactionStorageService } from '../transaction/transaction-storage.service';

/**
 * Health indicator for the in-process transaction store.
 */
@Injectable()
export class TransactionStoreHealthIndicator {
  constructor(
    private readonly transactionStorage: TransactionStorageService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  /**
   * @param key The key to use for the health indicator result.
   */
  isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);

    return Promise.resolve(
      indicator.up({
        active: this.transactionStorage.countActive(),
        stored: this.transactionStorage.size(),
      }),
    );
  }
}
