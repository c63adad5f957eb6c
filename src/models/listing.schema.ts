import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type ListingDocument = HydratedDocument<Listing>;

/**
 * Listing model (sale terms of one asset)
 *
 * Invariants:
 * - listed === true iff the asset is held in marketplace custody
 * - 0 < minPrice <= buyNowPrice (checked by ListingService, never mutated)
 * - auctionEnd is null until the first accepted bid
 *
 * Unlisted and sold listings stay as tombstones with listed=false
 */
@Schema({
  timestamps: true,
  collection: 'listings',
})
export class Listing {
  @Prop({ required: true, min: 0 })
  tokenId!: number;

  @Prop({ required: true, type: String })
  seller!: string;

  @Prop({ required: true, min: 1 })
  minPrice!: number;

  /**
   * A bid of at least this amount settles the auction immediately
   */
  @Prop({ required: true, min: 1 })
  buyNowPrice!: number;

  @Prop({ required: true, default: false })
  listed!: boolean;

  /**
   * Reset to now + extension on every accepted bid
   */
  @Prop({ type: Date, default: null })
  auctionEnd!: Date | null;
}

export const ListingSchema = SchemaFactory.createForClass(Listing);

ListingSchema.index({ tokenId: 1 }, { unique: true });
ListingSchema.index({ listed: 1, auctionEnd: 1 }); // settlement scheduler

/**
 * Returns the error for an update whose `$set` puts minPrice above buyNowPrice
 *
 * Listings are only written through findOneAndUpdate, so the check is
 * registered for that query rather than for save.
 */
export function checkListingPriceUpdate(update: unknown): Error | null {
  if (!update || typeof update !== 'object' || !('$set' in update)) {
    return null;
  }
  const set = update.$set;
  if (!set || typeof set !== 'object' || !('minPrice' in set) || !('buyNowPrice' in set)) {
    return null;
  }
  const { minPrice, buyNowPrice } = set;
  if (typeof minPrice === 'number' && typeof buyNowPrice === 'number' && minPrice > buyNowPrice) {
    return new Error('minPrice cannot exceed buyNowPrice');
  }
  return null;
}

ListingSchema.pre('findOneAndUpdate', function (next) {
  const error = checkListingPriceUpdate(this.getUpdate());
  if (error) {
    next(error);
  } else {
    next();
  }
});
