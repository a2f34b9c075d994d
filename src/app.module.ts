import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import appConfig from './app.config';
import { DEFAULT_THROTTLE_LIMIT, DEFAULT_THROTTLE_TTL } from './config/config.constants';
import { CertificateModule } from './certificate/certificate.module';
import { ChallengeModule } from './challenge/challenge.module';
import { CryptoModule } from './crypto/crypto.module';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { ThreeDsModule } from './three-ds/three-ds.module';
import { TransactionModule } from './transaction/transaction.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        throttlers: [
          {
            ttl: config.get<number>('tds.throttle.ttl') ?? DEFAULT_THROTTLE_TTL,
            limit: config.get<number>('tds.throttle.limit') ?? DEFAULT_THROTTLE_LIMIT,
          },
        ],
      }),
    }),
    CertificateModule,
    CryptoModule,
    TransactionModule,
    MetricsModule,
    HealthModule,
    ThreeDsModule,
    ChallengeModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
