import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { CryptoModule } from '../crypto/crypto.module';
import { TransactionModule } from '../transaction/transaction.module';
import { ThreeDsModule } from '../three-ds/three-ds.module';
import { ChallengeController } from './challenge.controller';
import { ChallengeService } from './challenge.service';
import { AcsPageHeadersMiddleware } from './acs-page-headers.middleware';
import { BROWSER_CHALLENGE_PATH, BROWSER_VERIFY_PATH } from '../three-ds/three-ds.constants';

@Module({
  imports: [CryptoModule, TransactionModule, ThreeDsModule],
  controllers: [ChallengeController],
  providers: [ChallengeService],
})
export class ChallengeModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(AcsPageHeadersMiddleware)
      .forRoutes(
        { path: BROWSER_CHALLENGE_PATH, method: RequestMethod.POST },
        { path: BROWSER_VERIFY_PATH, method: RequestMethod.POST },
      );
  }
}
