import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { TransactionStoreHealthIndicator } from './transaction.health';
import { CertificateModule } from '../certificate/certificate.module';
import { TransactionModule } from '../transaction/transaction.module';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, CertificateModule, TransactionModule],
  controllers: [HealthController],
  providers: [TransactionStoreHealthIndicator],
})
export class HealthModule {}
