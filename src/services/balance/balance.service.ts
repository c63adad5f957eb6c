import {
  Injectable,
  NotFoundException,
  BadRequestException,
  InternalServerErrorException,
  HttpException,
  Logger,
} from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { Connection, ClientSession, Model } from 'mongoose';
import { User, UserDocument } from '../../models/user.schema';
import {
  LedgerEntry,
  LedgerEntryDocument,
} from '../../models/ledger-entry.schema';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import { InsufficientFundsException } from '../../common/exceptions/market.exceptions';
import { runInTransaction } from '../../common/utils/transaction';

// операции с кошельком аккаунта, все атомарно через транзакции
// каждая операция создает запись в ledger
// баланс меняется только здесь
@Injectable()
export class BalanceService {
  private readonly logger = new Logger(BalanceService.name);

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(User.name) private userModel: Model<User>,
    @InjectModel(LedgerEntry.name)
    private ledgerEntryModel: Model<LedgerEntry>,
  ) {}

  async getBalance(userId: string): Promise<number> {
    const user = await this.userModel.findById(userId).exec();
    if (!user) {
      throw new NotFoundException(`User with ID ${userId} not found`);
    }
    return user.balance;
  }

  // пополнение кошелька, запись DEPOSIT
  async deposit(
    userId: string,
    amount: number,
    description?: string,
    session?: ClientSession,
  ): Promise<UserDocument> {
    this.assertAmount(amount);

    try {
      return await runInTransaction(
        this.connection,
        (tx) =>
          this.applyWalletChange(
            userId,
            amount,
            LedgerType.DEPOSIT,
            `deposit_${Date.now()}`,
            description || `Deposit ${amount}`,
            tx,
          ),
        session,
      );
    } catch (error) {
      throw this.wrapError(error, `deposit for user ${userId}`);
    }
  }

  // списание ставки в эскроу маркетплейса
  // баланс уменьшается, деньги лежат в HighestBid пока ставку не перебьют
  async escrow(
    userId: string,
    amount: number,
    referenceId: string,
    description?: string,
    session?: ClientSession,
  ): Promise<UserDocument> {
    this.assertAmount(amount);

    try {
      return await runInTransaction(
        this.connection,
        async (tx) => {
          const user = await this.userModel.findById(userId).session(tx).exec();
          if (!user) {
            throw new NotFoundException(`User with ID ${userId} not found`);
          }

          if (user.balance < amount) {
            throw new InsufficientFundsException(userId, amount, user.balance);
          }

          return this.applyWalletChange(
            userId,
            -amount,
            LedgerType.ESCROW,
            referenceId,
            description || `Escrow ${amount} for ${referenceId}`,
            tx,
          );
        },
        session,
      );
    } catch (error) {
      throw this.wrapError(error, `escrow for user ${userId}`);
    }
  }

  /**
   * Credit value coming back from the marketplace to a wallet
   *
   * Used by the payment gateway for refunds, withdrawals and sale proceeds.
   * Always joins the caller's transaction.
   */
  async receive(
    userId: string,
    amount: number,
    type: LedgerType.REFUND | LedgerType.WITHDRAWAL | LedgerType.SALE_PROCEEDS,
    referenceId: string,
    description: string,
    session: ClientSession,
  ): Promise<UserDocument> {
    this.assertAmount(amount);
    return this.applyWalletChange(userId, amount, type, referenceId, description, session);
  }

  async getLedgerHistory(userId: string, limit = 50): Promise<LedgerEntryDocument[]> {
    return this.ledgerEntryModel
      .find({ userId })
      .sort({ createdAt: -1 })
      .limit(limit)
      .exec();
  }

  // проверка инвариантов баланса
  async validateBalanceInvariants(userId: string): Promise<boolean> {
    const user = await this.userModel.findById(userId).exec();
    if (!user) {
      return false;
    }

    const invariantsValid = user.balance >= 0 && Number.isSafeInteger(user.balance);

    if (!invariantsValid) {
      this.logger.error(`Balance invariants violated for user ${userId}: balance=${user.balance}`);
    }

    return invariantsValid;
  }

  private async applyWalletChange(
    userId: string,
    delta: number,
    type: LedgerType,
    referenceId: string,
    description: string,
    session: ClientSession,
  ): Promise<UserDocument> {
    const updatedUser = await this.userModel
      .findByIdAndUpdate(userId, { $inc: { balance: delta } }, { new: true, session })
      .exec();

    if (!updatedUser) {
      throw new NotFoundException(`User with ID ${userId} not found`);
    }

    if (updatedUser.balance < 0) {
      throw new InternalServerErrorException(
        `Balance invariants violated after ${type} operation`,
      );
    }

    await this.ledgerEntryModel.create(
      [
        {
          userId,
          type,
          amount: Math.abs(delta),
          referenceId,
          description,
        },
      ],
      { session },
    );

    this.logger.log(`${type} ${Math.abs(delta)} for user ${userId}, reference ${referenceId}`);

    return updatedUser;
  }

  private assertAmount(amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new BadRequestException('Amount must be a positive integer');
    }
  }

  private wrapError(error: unknown, operation: string): HttpException {
    if (error instanceof HttpException) {
      return error;
    }

    this.logger.error(`Error processing ${operation}:`, error);
    const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';
    return new InternalServerErrorException(`Failed to process ${operation}: ${errorMessage}`);
  }
}
