import { Module } from '@nestjs/common';
import { CryptoModule } from '../crypto/crypto.module';
import { TransactionModule } from '../transaction/transaction.module';
import { ThreeDsController } from './three-ds.controller';
import { ThreeDsService } from './three-ds.service';

@Module({
  imports: [CryptoModule, TransactionModule],
  controllers: [ThreeDsController],
  providers: [ThreeDsService],
  exports: [ThreeDsService],
})
export class ThreeDsModule {}
