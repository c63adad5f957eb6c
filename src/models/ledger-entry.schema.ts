import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { LedgerType } from '../common/enums/ledger-type.enum';

export type LedgerEntryDocument = HydratedDocument<LedgerEntry>;

/**
 * LedgerEntry model
 *
 * Immutable financial audit trail.
 * EVERY wallet or credit mutation MUST create a ledger entry.
 *
 * Invariants:
 * - amount > 0 (direction determined by type)
 * - referenceId points to the asset or operation that caused the movement
 * - Entries are NEVER modified or deleted
 */
@Schema({
  timestamps: true,
  collection: 'ledger_entries',
})
export class LedgerEntry {
  @Prop({ required: true, type: String, index: true })
  userId!: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(LedgerType),
    index: true,
  })
  type!: LedgerType;

  /**
   * Direction by type:
   * - DEPOSIT, REFUND, WITHDRAWAL, SALE_PROCEEDS: increase wallet balance
   * - ESCROW: decreases wallet balance
   * - CREDIT: increases the credit ledger entry, wallet untouched
   */
  @Prop({ required: true, min: 1 })
  amount!: number;

  /**
   * - ESCROW, REFUND and the CREDIT for an undelivered refund: `bid:{tokenId}`
   * - SALE_PROCEEDS and the CREDIT for undelivered proceeds: `sale:{tokenId}`
   * - WITHDRAWAL: `credits:{account}`
   * - DEPOSIT: `deposit_{timestamp}`
   */
  @Prop({ required: true, type: String, index: true })
  referenceId!: string;

  @Prop()
  description?: string;

  // filled in by timestamps
  createdAt!: Date;
}

export const LedgerEntrySchema = SchemaFactory.createForClass(LedgerEntry);

LedgerEntrySchema.index({ userId: 1, createdAt: -1 }); // account history
LedgerEntrySchema.index({ referenceId: 1, type: 1 });

// Immutability: prevent updates and deletes
LedgerEntrySchema.pre(['updateOne', 'findOneAndUpdate', 'deleteOne'], function (next) {
  next(new Error('Ledger entries are immutable and cannot be modified or deleted'));
});
