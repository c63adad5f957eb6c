import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type AssetDocument = HydratedDocument<Asset>;

/**
 * Asset model
 *
 * A non-fungible asset identified by a sequential tokenId.
 * `owner` is an account id, or MARKETPLACE_CUSTODY while the asset is listed.
 * `approved` is the single operator allowed to move the asset on the owner's
 * behalf, cleared on every transfer.
 */
@Schema({
  timestamps: true,
  collection: 'assets',
})
export class Asset {
  @Prop({ required: true, min: 0 })
  tokenId!: number;

  @Prop({ required: true, type: String })
  owner!: string;

  @Prop({ type: String, default: null })
  approved!: string | null;
}

export const AssetSchema = SchemaFactory.createForClass(Asset);

AssetSchema.index({ tokenId: 1 }, { unique: true });
AssetSchema.index({ owner: 1 });
