import {
  Injectable,
  InternalServerErrorException,
  HttpException,
  Logger,
} from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { ClientSession, Connection, Model } from 'mongoose';
import { Listing, ListingDocument } from '../../models/listing.schema';
import { HighestBid } from '../../models/highest-bid.schema';
import { MARKETPLACE_CUSTODY } from '../../common/constants';
import {
  BidOutstandingException,
  InvalidPriceException,
  NotListedException,
  NotOwnerException,
  NotSellerException,
} from '../../common/exceptions/market.exceptions';
import { runInTransaction } from '../../common/utils/transaction';
import { AssetCustodyService } from '../custody/asset-custody.service';
import { lockKeys, RedisLockService } from '../redis-lock/redis-lock.service';

export interface ListingView {
  tokenId: number;
  seller: string | null;
  minPrice: number;
  buyNowPrice: number;
  listed: boolean;
  auctionEnd: Date | null;
}

/**
 * ListingService
 *
 * Sale terms and custody state per asset.
 * listed === true exactly while the marketplace holds the asset.
 *
 * Does NOT handle bids or settlement (AuctionService), but exposes the
 * listing mutations AuctionService needs inside its own transactions.
 */
@Injectable()
export class ListingService {
  private readonly logger = new Logger(ListingService.name);

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(Listing.name) private listingModel: Model<Listing>,
    @InjectModel(HighestBid.name) private highestBidModel: Model<HighestBid>,
    private custodyService: AssetCustodyService,
    private redisLockService: RedisLockService,
  ) {}

  /**
   * List an asset: custody moves from the seller to the marketplace
   *
   * @param tokenId Asset to list
   * @param caller Authenticated account, must own the asset
   * @param minPrice Lowest acceptable first bid
   * @param buyNowPrice Bid amount that settles the auction immediately
   * @throws InvalidPriceException if prices are not 0 < minPrice <= buyNowPrice
   * @throws NotOwnerException if caller does not own the asset
   * @throws TransferNotAuthorizedException if the marketplace is not approved
   */
  async list(
    tokenId: number,
    caller: string,
    minPrice: number,
    buyNowPrice: number,
  ): Promise<ListingView> {
    this.validatePrices(minPrice, buyNowPrice);

    return this.guard(`list asset ${tokenId}`, () =>
      this.redisLockService.withLock(lockKeys.asset(tokenId), () =>
        runInTransaction(this.connection, async (session) => {
          const owner = await this.custodyService.ownerOf(tokenId, session);
          if (owner !== caller) {
            throw new NotOwnerException(tokenId, caller);
          }

          await this.custodyService.transferCustody(
            tokenId,
            caller,
            MARKETPLACE_CUSTODY,
            MARKETPLACE_CUSTODY,
            session,
          );

          const listing = await this.listingModel
            .findOneAndUpdate(
              { tokenId },
              {
                $set: {
                  seller: caller,
                  minPrice,
                  buyNowPrice,
                  listed: true,
                  auctionEnd: null,
                },
              },
              { new: true, upsert: true, session },
            )
            .exec();

          if (!listing) {
            throw new InternalServerErrorException(`Failed to list asset ${tokenId}`);
          }

          this.logger.log(
            `Listed asset ${tokenId} by ${caller}: min ${minPrice}, buy now ${buyNowPrice}`,
          );
          return this.toView(listing);
        }),
      ),
    );
  }

  /**
   * Take an asset off the market, custody goes back to the seller
   *
   * Rejected while a bid is outstanding: the escrowed bid would otherwise
   * have no asset to settle against.
   */
  async unlist(tokenId: number, caller: string): Promise<ListingView> {
    return this.guard(`unlist asset ${tokenId}`, () =>
      this.redisLockService.withLock(lockKeys.asset(tokenId), () =>
        runInTransaction(this.connection, async (session) => {
          const listing = await this.getListedOrThrow(tokenId, session);

          if (listing.seller !== caller) {
            throw new NotSellerException(tokenId, caller);
          }

          const bid = await this.highestBidModel
            .findOne({ tokenId })
            .session(session)
            .exec();
          if (bid) {
            throw new BidOutstandingException(tokenId);
          }

          const closed = await this.closeListing(tokenId, session);

          // только продавцу, больше никому
          await this.custodyService.transferCustody(
            tokenId,
            MARKETPLACE_CUSTODY,
            listing.seller,
            MARKETPLACE_CUSTODY,
            session,
          );

          this.logger.log(`Unlisted asset ${tokenId}, returned to ${listing.seller}`);
          return this.toView(closed);
        }),
      ),
    );
  }

  /**
   * Read accessor, zero-value record when the asset was never listed
   */
  async getListing(tokenId: number): Promise<ListingView> {
    const listing = await this.listingModel.findOne({ tokenId }).exec();
    if (!listing) {
      return {
        tokenId,
        seller: null,
        minPrice: 0,
        buyNowPrice: 0,
        listed: false,
        auctionEnd: null,
      };
    }
    return this.toView(listing);
  }

  async getActiveListings(): Promise<ListingView[]> {
    const listings = await this.listingModel
      .find({ listed: true })
      .sort({ tokenId: 1 })
      .exec();
    return listings.map((listing) => this.toView(listing));
  }

  /**
   * Listed assets whose auction deadline has passed, oldest deadline first
   */
  async findDueForSettlement(now: Date, limit: number): Promise<ListingView[]> {
    const listings = await this.listingModel
      .find({ listed: true, auctionEnd: { $ne: null, $lte: now } })
      .sort({ auctionEnd: 1 })
      .limit(limit)
      .exec();
    return listings.map((listing) => this.toView(listing));
  }

  async getListedOrThrow(tokenId: number, session: ClientSession): Promise<ListingDocument> {
    const listing = await this.listingModel
      .findOne({ tokenId })
      .session(session)
      .exec();

    if (!listing || !listing.listed) {
      throw new NotListedException(tokenId);
    }
    return listing;
  }

  async setAuctionEnd(
    tokenId: number,
    auctionEnd: Date,
    session: ClientSession,
  ): Promise<ListingDocument> {
    const listing = await this.listingModel
      .findOneAndUpdate(
        { tokenId, listed: true },
        { $set: { auctionEnd } },
        { new: true, session },
      )
      .exec();

    if (!listing) {
      throw new NotListedException(tokenId);
    }
    return listing;
  }

  // listed=false, запись остается как tombstone
  async closeListing(tokenId: number, session: ClientSession): Promise<ListingDocument> {
    const listing = await this.listingModel
      .findOneAndUpdate(
        { tokenId, listed: true },
        { $set: { listed: false, auctionEnd: null } },
        { new: true, session },
      )
      .exec();

    if (!listing) {
      throw new NotListedException(tokenId);
    }
    return listing;
  }

  toView(listing: Listing): ListingView {
    return {
      tokenId: listing.tokenId,
      seller: listing.seller,
      minPrice: listing.minPrice,
      buyNowPrice: listing.buyNowPrice,
      listed: listing.listed,
      auctionEnd: listing.auctionEnd ?? null,
    };
  }

  private validatePrices(minPrice: number, buyNowPrice: number): void {
    if (!Number.isSafeInteger(minPrice) || minPrice <= 0) {
      throw new InvalidPriceException('minPrice must be a positive integer');
    }
    if (!Number.isSafeInteger(buyNowPrice) || buyNowPrice < minPrice) {
      throw new InvalidPriceException('buyNowPrice must be an integer not below minPrice');
    }
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
