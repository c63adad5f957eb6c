import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type CreditEntryDocument = HydratedDocument<CreditEntry>;

/**
 * CreditEntry model
 *
 * Pull-based balance owed to an account after a direct transfer to it failed.
 * Only the owning account may withdraw it (CreditLedgerService).
 *
 * Invariants:
 * - amount >= 0
 * - one entry per account, created on the first failed transfer
 */
@Schema({
  timestamps: true,
  collection: 'credit_entries',
})
export class CreditEntry {
  @Prop({ required: true, type: String })
  account!: string;

  @Prop({ required: true, default: 0, min: 0 })
  amount!: number;
}

export const CreditEntrySchema = SchemaFactory.createForClass(CreditEntry);

CreditEntrySchema.index({ account: 1 }, { unique: true });
