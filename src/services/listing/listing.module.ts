import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { Listing, ListingSchema } from '../../models/listing.schema';
import { HighestBid, HighestBidSchema } from '../../models/highest-bid.schema';
import { CustodyModule } from '../custody/custody.module';
import { ListingService } from './listing.service';

/**
 * ListingModule
 *
 * Provides ListingService (sale terms and custody state per asset)
 * RedisLockService comes from the global RedisLockModule
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Listing.name, schema: ListingSchema },
      { name: HighestBid.name, schema: HighestBidSchema },
    ]),
    CustodyModule,
  ],
  providers: [ListingService],
  exports: [ListingService],
})
export class ListingModule {}
