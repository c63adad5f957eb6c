import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { CreditEntry, CreditEntrySchema } from '../../models/credit-entry.schema';
import { LedgerEntry, LedgerEntrySchema } from '../../models/ledger-entry.schema';
import { TransferModule } from '../transfer/transfer.module';
import { CreditLedgerService } from './credit-ledger.service';

/**
 * CreditModule
 *
 * Provides CreditLedgerService for failed-transfer credits
 * RedisLockService comes from the global RedisLockModule
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: CreditEntry.name, schema: CreditEntrySchema },
      { name: LedgerEntry.name, schema: LedgerEntrySchema },
    ]),
    TransferModule,
  ],
  providers: [CreditLedgerService],
  exports: [CreditLedgerService],
})
export class CreditModule {}
