import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type UserDocument = HydratedDocument<User>;

/**
 * User model (a marketplace account)
 *
 * Financial invariants:
 * - balance >= 0
 *
 * `balance` is value the account holds outside the marketplace.
 * Bids move value out of it into escrow, refunds and payouts move it back.
 * All balance mutations MUST go through BalanceService or the payment gateway
 */
@Schema({
  timestamps: true,
  collection: 'users',
})
export class User {
  @Prop({ required: true })
  username!: string;

  /**
   * Hashed password (bcrypt)
   * Not selected by default, use .select('+password')
   */
  @Prop({ required: false, select: false })
  password?: string;

  @Prop({ required: false })
  email?: string;

  /**
   * Spendable balance in the smallest currency unit
   */
  @Prop({ required: true, default: 0, min: 0 })
  balance!: number;

  /**
   * When false every incoming transfer to this account fails
   * (a recipient that cannot or will not take payments)
   */
  @Prop({ required: true, default: true })
  acceptsPayments!: boolean;
}

export const UserSchema = SchemaFactory.createForClass(User);

UserSchema.index({ username: 1 }, { unique: true });

UserSchema.pre('save', function (next) {
  if (this.balance < 0) {
    next(new Error('Balance must be non-negative'));
  } else {
    next();
  }
});
