import {
  Injectable,
  BadRequestException,
  InternalServerErrorException,
  HttpException,
  Logger,
} from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { Connection, ClientSession, Model } from 'mongoose';
import { CreditEntry } from '../../models/credit-entry.schema';
import { LedgerEntry } from '../../models/ledger-entry.schema';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import {
  NoCreditsException,
  NotReceiverException,
  WithdrawFailedException,
} from '../../common/exceptions/market.exceptions';
import { runInTransaction } from '../../common/utils/transaction';
import { lockKeys, RedisLockService } from '../redis-lock/redis-lock.service';
import { ValueTransferService } from '../transfer/value-transfer.service';

export interface WithdrawalResult {
  account: string;
  amount: number;
}

/**
 * CreditLedgerService
 *
 * Pull-based fallback for value that could not be delivered directly.
 *
 * Rules:
 * - only the owning account can withdraw its entry
 * - the entry is zeroed before the payout is attempted
 * - a failed payout aborts the transaction, the zeroing is rolled back
 */
@Injectable()
export class CreditLedgerService {
  private readonly logger = new Logger(CreditLedgerService.name);

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(CreditEntry.name) private creditEntryModel: Model<CreditEntry>,
    @InjectModel(LedgerEntry.name) private ledgerEntryModel: Model<LedgerEntry>,
    private valueTransferService: ValueTransferService,
    private redisLockService: RedisLockService,
  ) {}

  /**
   * Withdrawable balance of an account, zero when it never had a failed transfer
   */
  async creditedBalance(account: string, session?: ClientSession): Promise<number> {
    const query = this.creditEntryModel.findOne({ account });
    if (session) {
      query.session(session);
    }
    const entry = await query.exec();
    return entry?.amount ?? 0;
  }

  /**
   * Park `amount` for `account` after a direct transfer to it failed
   * Always joins the caller's transaction
   */
  async credit(
    account: string,
    amount: number,
    referenceId: string,
    description: string,
    session: ClientSession,
  ): Promise<number> {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new BadRequestException('Credit amount must be a positive integer');
    }

    const entry = await this.creditEntryModel
      .findOneAndUpdate(
        { account },
        { $inc: { amount } },
        { new: true, upsert: true, session },
      )
      .exec();

    if (!entry) {
      throw new InternalServerErrorException(`Failed to credit account ${account}`);
    }

    await this.ledgerEntryModel.create(
      [
        {
          userId: account,
          type: LedgerType.CREDIT,
          amount,
          referenceId,
          description,
        },
      ],
      { session },
    );

    this.logger.warn(`Credited ${amount} to ${account} (${referenceId}), outstanding ${entry.amount}`);

    return entry.amount;
  }

  /**
   * Pay out the whole credited balance of `receiver`
   *
   * @param caller authenticated account making the request
   * @param receiver account whose credits are withdrawn, must equal caller
   * @throws NotReceiverException when caller !== receiver
   * @throws NoCreditsException when there is nothing to withdraw
   * @throws WithdrawFailedException when the payout cannot be delivered
   */
  async withdrawAllFailedCredits(caller: string, receiver: string): Promise<WithdrawalResult> {
    if (caller !== receiver) {
      this.logger.warn(`Rejected withdrawal of ${receiver} credits requested by ${caller}`);
      throw new NotReceiverException(caller, receiver);
    }

    try {
      return await this.redisLockService.withLock(lockKeys.credits(receiver), () =>
        runInTransaction(this.connection, (session) =>
          this.executeWithdrawal(receiver, session),
        ),
      );
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      this.logger.error(`Error withdrawing credits for ${receiver}:`, error);
      const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';
      throw new InternalServerErrorException(`Failed to withdraw credits: ${errorMessage}`);
    }
  }

  private async executeWithdrawal(
    receiver: string,
    session: ClientSession,
  ): Promise<WithdrawalResult> {
    const amount = await this.creditedBalance(receiver, session);
    if (amount <= 0) {
      throw new NoCreditsException(receiver);
    }

    // обнуляем до выплаты: повторный вызов во время выплаты увидит 0
    const cleared = await this.creditEntryModel
      .findOneAndUpdate(
        { account: receiver, amount },
        { $set: { amount: 0 } },
        { new: true, session },
      )
      .exec();

    if (!cleared) {
      throw new NoCreditsException(receiver);
    }

    const result = await this.valueTransferService.send(
      receiver,
      amount,
      {
        type: LedgerType.WITHDRAWAL,
        referenceId: `credits:${receiver}`,
        description: `Withdrawal of ${amount} failed-transfer credits`,
      },
      session,
    );

    if (!result.ok) {
      // исключение откатывает транзакцию вместе с обнулением
      throw new WithdrawFailedException(receiver, result.reason);
    }

    this.logger.log(`Withdrew ${amount} credits for ${receiver}`);

    return { account: receiver, amount };
  }
}
