import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { ClientSession, Model, isValidObjectId } from 'mongoose';
import { User } from '../../models/user.schema';
import { BalanceService } from '../balance/balance.service';
import { PaymentGateway, TransferContext, TransferResult } from './transfer.types';

// доставка денег на кошелек аккаунта внутри той же транзакции
// аккаунт с acceptsPayments=false платежи не принимает
@Injectable()
export class WalletPaymentGateway implements PaymentGateway {
  constructor(
    @InjectModel(User.name) private userModel: Model<User>,
    private balanceService: BalanceService,
  ) {}

  async deliver(
    to: string,
    amount: number,
    context: TransferContext,
    session: ClientSession,
  ): Promise<TransferResult> {
    if (!isValidObjectId(to)) {
      return { ok: false, reason: `unknown account ${to}` };
    }

    const recipient = await this.userModel.findById(to).session(session).exec();
    if (!recipient) {
      return { ok: false, reason: `unknown account ${to}` };
    }

    if (recipient.acceptsPayments === false) {
      return { ok: false, reason: `account ${to} does not accept payments` };
    }

    await this.balanceService.receive(
      to,
      amount,
      context.type,
      context.referenceId,
      context.description,
      session,
    );

    return { ok: true };
  }
}
