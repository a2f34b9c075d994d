import { Injectable, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TransactionStorageService } from './transaction-storage.service';
import { DEFAULT_TRANSACTION_CLEANUP_INTERVAL } from '../config/config.constants';

@Injectable()
export class TransactionCleanupService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TransactionCleanupService.name);
  private cleanupInterval?: NodeJS.Timeout;
  private readonly intervalMs: number;

  constructor(
    private readonly storageService: TransactionStorageService,
    private readonly configService: ConfigService,
  ) {
    const intervalSeconds = this.configService.get<number>(
      'tds.transaction.cleanupInterval',
      DEFAULT_TRANSACTION_CLEANUP_INTERVAL,
    );
    this.intervalMs = intervalSeconds * 1000;
  }

  onModuleInit() {
    this.cleanupInterval = setInterval(() => {
      this.storageService.purgeExpired(Date.now());
    }, this.intervalMs);
    // Do not keep the process alive for the sweep alone
    this.cleanupInterval.unref();

    this.logger.log(`Cleanup job scheduled every ${this.intervalMs / 1000}s`);
  }

  onModuleDestroy() {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
      this.logger.log('Cleanup job stopped');
    }
  }
}
