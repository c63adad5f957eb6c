import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { AuctionService } from './auction.service';
import { HighestBid, HighestBidSchema } from '../../models/highest-bid.schema';
import { BalanceModule } from '../balance/balance.module';
import { CreditModule } from '../credit/credit.module';
import { CustodyModule } from '../custody/custody.module';
import { ListingModule } from '../listing/listing.module';
import { TransferModule } from '../transfer/transfer.module';

/**
 * AuctionModule
 *
 * Provides AuctionService for bidding and settlement
 * Depends on ListingModule, BalanceModule, CreditModule and TransferModule
 */
@Module({
  imports: [
    MongooseModule.forFeature([{ name: HighestBid.name, schema: HighestBidSchema }]),
    ListingModule,
    BalanceModule,
    CreditModule,
    CustodyModule,
    TransferModule,
  ],
  providers: [AuctionService],
  exports: [AuctionService],
})
export class AuctionModule {}
