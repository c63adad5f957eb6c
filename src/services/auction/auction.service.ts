import {
  Injectable,
  BadRequestException,
  InternalServerErrorException,
  HttpException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { Connection, ClientSession, Model } from 'mongoose';
import { HighestBid } from '../../models/highest-bid.schema';
import { Listing } from '../../models/listing.schema';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import { MARKETPLACE_CUSTODY } from '../../common/constants';
import {
  AuctionEndedException,
  AuctionNotEndedException,
  BidTooLowException,
  NoBidsException,
} from '../../common/exceptions/market.exceptions';
import { runInTransaction } from '../../common/utils/transaction';
import { BalanceService } from '../balance/balance.service';
import { CreditLedgerService } from '../credit/credit-ledger.service';
import { AssetCustodyService } from '../custody/asset-custody.service';
import { ListingService } from '../listing/listing.service';
import { lockKeys, RedisLockService } from '../redis-lock/redis-lock.service';
import { ValueTransferService } from '../transfer/value-transfer.service';
import { OutboundTransferType } from '../transfer/transfer.types';

export interface HighestBidView {
  tokenId: number;
  bidder: string | null;
  amount: number;
}

/**
 * Where value leaving escrow ended up:
 * delivered directly, or parked in the credit ledger
 */
export interface PayoutResult {
  account: string;
  amount: number;
  delivered: boolean;
}

export interface SettlementResult {
  tokenId: number;
  winner: string;
  seller: string;
  amount: number;
  proceeds: PayoutResult;
}

export interface BidResult {
  tokenId: number;
  bidder: string;
  amount: number;
  auctionEnd: Date | null;
  displaced: PayoutResult | null;
  settlement: SettlementResult | null;
}

// ставки, вытеснение предыдущего лидера, продление и расчет
// балансы только через BalanceService, листинги через ListingService
// порядок: проверки -> запись состояния -> внешние переводы
@Injectable()
export class AuctionService {
  private readonly logger = new Logger(AuctionService.name);
  private readonly extensionMs: number;
  private readonly minIncrementPct: number;

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(HighestBid.name) private highestBidModel: Model<HighestBid>,
    private listingService: ListingService,
    private balanceService: BalanceService,
    private creditLedgerService: CreditLedgerService,
    private custodyService: AssetCustodyService,
    private valueTransferService: ValueTransferService,
    private redisLockService: RedisLockService,
    private configService: ConfigService,
  ) {
    this.extensionMs = this.configService.get<number>('auction.extensionMs', 900000);
    this.minIncrementPct = this.configService.get<number>('auction.minIncrementPct', 5);
  }

  /**
   * Smallest acceptable bid
   *
   * First bid: minPrice. Later bids: at least minIncrementPct above the
   * previous amount and always strictly above it.
   */
  requiredBid(listing: Pick<Listing, 'minPrice'>, previousAmount: number | null): number {
    if (previousAmount === null) {
      return listing.minPrice;
    }
    const withIncrement = Math.ceil((previousAmount * (100 + this.minIncrementPct)) / 100);
    return Math.max(withIncrement, previousAmount + 1);
  }

  /**
   * Place a bid with `value` escrowed from the caller's wallet
   *
   * The displaced leader is refunded directly or, if that fails, through the
   * credit ledger. A refund the gateway refuses never rejects the bid; an
   * error thrown during delivery aborts it and rolls everything back.
   *
   * @throws NotListedException if the asset is not listed
   * @throws AuctionEndedException if the deadline passed and settlement is pending
   * @throws BidTooLowException if value is below the required amount
   * @throws InsufficientFundsException if the wallet cannot cover value
   */
  async placeBid(tokenId: number, caller: string, value: number): Promise<BidResult> {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new BadRequestException('Bid amount must be a positive integer');
    }

    return this.guard(`place bid on asset ${tokenId}`, () =>
      this.redisLockService.withLock(lockKeys.asset(tokenId), () =>
        runInTransaction(this.connection, (session) =>
          this.executeBid(tokenId, caller, value, session),
        ),
      ),
    );
  }

  /**
   * Close an auction whose deadline has passed
   *
   * Anyone may trigger settlement. The asset goes to the highest bidder,
   * the winning amount to the seller (credit ledger on failed delivery).
   */
  async settle(tokenId: number): Promise<SettlementResult> {
    return this.guard(`settle asset ${tokenId}`, () =>
      this.redisLockService.withLock(lockKeys.asset(tokenId), () =>
        runInTransaction(this.connection, (session) =>
          this.executeSettlement(tokenId, false, session),
        ),
      ),
    );
  }

  async getHighestBid(tokenId: number): Promise<HighestBidView> {
    const bid = await this.highestBidModel.findOne({ tokenId }).exec();
    if (!bid) {
      return { tokenId, bidder: null, amount: 0 };
    }
    return { tokenId, bidder: bid.bidder, amount: bid.amount };
  }

  private async executeBid(
    tokenId: number,
    caller: string,
    value: number,
    session: ClientSession,
  ): Promise<BidResult> {
    const listing = await this.listingService.getListedOrThrow(tokenId, session);
    const now = new Date();

    if (listing.auctionEnd && now.getTime() >= listing.auctionEnd.getTime()) {
      throw new AuctionEndedException(tokenId, listing.auctionEnd);
    }

    const previous = await this.highestBidModel
      .findOne({ tokenId })
      .session(session)
      .exec();

    const required = this.requiredBid(listing, previous ? previous.amount : null);
    if (value < required) {
      throw new BidTooLowException(value, required);
    }

    const referenceId = `bid:${tokenId}`;
    await this.balanceService.escrow(
      caller,
      value,
      referenceId,
      `Bid ${value} on asset ${tokenId}`,
      session,
    );

    // сначала фиксируем новое состояние, потом возврат предыдущему
    const displacedBid = previous ? { bidder: previous.bidder, amount: previous.amount } : null;

    await this.highestBidModel
      .findOneAndUpdate(
        { tokenId },
        { $set: { bidder: caller, amount: value } },
        { new: true, upsert: true, session },
      )
      .exec();

    const auctionEnd = new Date(now.getTime() + this.extensionMs);
    await this.listingService.setAuctionEnd(tokenId, auctionEnd, session);

    this.logger.log(
      `Bid ${value} on asset ${tokenId} by ${caller} accepted, auction ends ${auctionEnd.toISOString()}`,
    );

    let displaced: PayoutResult | null = null;
    if (displacedBid) {
      displaced = await this.payOut(
        displacedBid.bidder,
        displacedBid.amount,
        LedgerType.REFUND,
        referenceId,
        `Refund of outbid ${displacedBid.amount} on asset ${tokenId}`,
        session,
      );
    }

    if (value >= listing.buyNowPrice) {
      this.logger.log(`Buy-now price reached for asset ${tokenId}`);
      const settlement = await this.executeSettlement(tokenId, true, session);
      return {
        tokenId,
        bidder: caller,
        amount: value,
        auctionEnd: null,
        displaced,
        settlement,
      };
    }

    return {
      tokenId,
      bidder: caller,
      amount: value,
      auctionEnd,
      displaced,
      settlement: null,
    };
  }

  private async executeSettlement(
    tokenId: number,
    buyNow: boolean,
    session: ClientSession,
  ): Promise<SettlementResult> {
    const listing = await this.listingService.getListedOrThrow(tokenId, session);

    const bid = await this.highestBidModel
      .findOne({ tokenId })
      .session(session)
      .exec();
    if (!bid) {
      throw new NoBidsException(tokenId);
    }

    if (!buyNow && listing.auctionEnd && Date.now() < listing.auctionEnd.getTime()) {
      throw new AuctionNotEndedException(tokenId, listing.auctionEnd);
    }

    const winner = bid.bidder;
    const amount = bid.amount;
    const seller = listing.seller;

    await this.listingService.closeListing(tokenId, session);
    await this.highestBidModel.deleteOne({ tokenId }, { session }).exec();
    await this.custodyService.transferCustody(
      tokenId,
      MARKETPLACE_CUSTODY,
      winner,
      MARKETPLACE_CUSTODY,
      session,
    );

    const proceeds = await this.payOut(
      seller,
      amount,
      LedgerType.SALE_PROCEEDS,
      `sale:${tokenId}`,
      `Sale of asset ${tokenId} to ${winner}`,
      session,
    );

    this.logger.log(`Settled asset ${tokenId}: ${winner} won for ${amount}, seller ${seller}`);

    return { tokenId, winner, seller, amount, proceeds };
  }

  // один прямой перевод, при неудаче в credit ledger
  private async payOut(
    account: string,
    amount: number,
    type: OutboundTransferType,
    referenceId: string,
    description: string,
    session: ClientSession,
  ): Promise<PayoutResult> {
    const result = await this.valueTransferService.send(
      account,
      amount,
      { type, referenceId, description },
      session,
    );

    if (result.ok) {
      return { account, amount, delivered: true };
    }

    await this.creditLedgerService.credit(
      account,
      amount,
      referenceId,
      `${description} (undelivered: ${result.reason})`,
      session,
    );
    return { account, amount, delivered: false };
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      this.logger.error(`Error during ${operation}:`, error);
      const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';
      throw new InternalServerErrorException(`Failed to ${operation}: ${errorMessage}`);
    }
  }
}
