import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type HighestBidDocument = HydratedDocument<HighestBid>;

/**
 * HighestBid model
 *
 * The current leading bid of a listed asset, at most one per tokenId.
 * Replaced (never merged) by every higher accepted bid and removed on
 * settlement. `amount` is held in marketplace escrow while the record exists.
 */
@Schema({
  timestamps: true,
  collection: 'highest_bids',
})
export class HighestBid {
  @Prop({ required: true, min: 0 })
  tokenId!: number;

  @Prop({ required: true, type: String })
  bidder!: string;

  @Prop({ required: true, min: 1 })
  amount!: number;
}

export const HighestBidSchema = SchemaFactory.createForClass(HighestBid);

HighestBidSchema.index({ tokenId: 1 }, { unique: true });
HighestBidSchema.index({ bidder: 1 });
