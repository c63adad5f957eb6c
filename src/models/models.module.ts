import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import {
  User,
  UserSchema,
  Asset,
  AssetSchema,
  Listing,
  ListingSchema,
  HighestBid,
  HighestBidSchema,
  CreditEntry,
  CreditEntrySchema,
  LedgerEntry,
  LedgerEntrySchema,
} from './index';

/**
 * Models module
 * Registers all Mongoose schemas
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: User.name, schema: UserSchema },
      { name: Asset.name, schema: AssetSchema },
      { name: Listing.name, schema: ListingSchema },
      { name: HighestBid.name, schema: HighestBidSchema },
      { name: CreditEntry.name, schema: CreditEntrySchema },
      { name: LedgerEntry.name, schema: LedgerEntrySchema },
    ]),
  ],
  exports: [MongooseModule],
})
export class ModelsModule {}
