import { Module } from '@nestjs/common';
import { TransactionStorageService } from './transaction-storage.service';
import { TransactionCleanupService } from './transaction-cleanup.service';

@Module({
  providers: [TransactionStorageService, TransactionCleanupService],
  exports: [TransactionStorageService],
})
export class TransactionModule {}
