import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken, getConnectionToken } from '@nestjs/mongoose';
import { BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuctionService } from './auction.service';
import { BalanceService } from '../balance/balance.service';
import { CreditLedgerService } from '../credit/credit-ledger.service';
import { AssetCustodyService } from '../custody/asset-custody.service';
import { ListingService } from '../listing/listing.service';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import { ValueTransferService } from '../transfer/value-transfer.service';
import { HighestBid } from '../../models/highest-bid.schema';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import { MARKETPLACE_CUSTODY } from '../../common/constants';
import {
  AuctionEndedException,
  AuctionNotEndedException,
  BidTooLowException,
  InsufficientFundsException,
  NoBidsException,
} from '../../common/exceptions/market.exceptions';

describe('AuctionService', () => {
  let service: AuctionService;
  let highestBidModel: any;
  let listingService: any;
  let balanceService: any;
  let creditLedgerService: any;
  let custodyService: any;
  let valueTransferService: any;
  let session: any;

  const extensionMs = 15 * 60 * 1000;

  const mockConnection = {
    startSession: jest.fn(),
  };

  const openListing = {
    tokenId: 0,
    seller: 'alice',
    minPrice: 100,
    buyNowPrice: 1000,
    listed: true,
    auctionEnd: null as Date | null,
  };

  const withBid = (bid: unknown) =>
    highestBidModel.findOne.mockReturnValue({
      session: jest.fn().mockReturnValue({
        exec: jest.fn().mockResolvedValue(bid),
      }),
      exec: jest.fn().mockResolvedValue(bid),
    });

  beforeEach(async () => {
    session = {
      endSession: jest.fn(),
      withTransaction: jest.fn((callback) => callback()),
    };
    mockConnection.startSession.mockReturnValue(session);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuctionService,
        {
          provide: getModelToken(HighestBid.name),
          useValue: {
            findOne: jest.fn(),
            findOneAndUpdate: jest.fn().mockReturnValue({
              exec: jest.fn().mockResolvedValue({}),
            }),
            deleteOne: jest.fn().mockReturnValue({
              exec: jest.fn().mockResolvedValue({ deletedCount: 1 }),
            }),
          },
        },
        {
          provide: getConnectionToken(),
          useValue: mockConnection,
        },
        {
          provide: ListingService,
          useValue: {
            getListedOrThrow: jest.fn().mockResolvedValue(openListing),
            setAuctionEnd: jest.fn().mockResolvedValue({}),
            closeListing: jest.fn().mockResolvedValue({}),
          },
        },
        {
          provide: BalanceService,
          useValue: {
            escrow: jest.fn().mockResolvedValue({}),
          },
        },
        {
          provide: CreditLedgerService,
          useValue: {
            credit: jest.fn().mockResolvedValue(0),
          },
        },
        {
          provide: AssetCustodyService,
          useValue: {
            transferCustody: jest.fn().mockResolvedValue({}),
          },
        },
        {
          provide: ValueTransferService,
          useValue: {
            send: jest.fn().mockResolvedValue({ ok: true }),
          },
        },
        {
          provide: RedisLockService,
          useValue: {
            withLock: jest.fn((_key: string, fn: () => Promise<unknown>) => fn()),
          },
        },
        {
          provide: ConfigService,
          useValue: new ConfigService({ auction: { extensionMs, minIncrementPct: 5 } }),
        },
      ],
    }).compile();

    service = module.get<AuctionService>(AuctionService);
    highestBidModel = module.get(getModelToken(HighestBid.name));
    listingService = module.get(ListingService);
    balanceService = module.get(BalanceService);
    creditLedgerService = module.get(CreditLedgerService);
    custodyService = module.get(AssetCustodyService);
    valueTransferService = module.get(ValueTransferService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('requiredBid', () => {
    it('should require minPrice for the first bid', () => {
      expect(service.requiredBid({ minPrice: 100 }, null)).toBe(100);
    });

    it('should require a 5% increment rounded up', () => {
      expect(service.requiredBid({ minPrice: 1 }, 100)).toBe(105);
      expect(service.requiredBid({ minPrice: 1 }, 101)).toBe(107);
    });

    it('should always require strictly more than the previous bid', () => {
      expect(service.requiredBid({ minPrice: 1 }, 1)).toBe(2);
      expect(service.requiredBid({ minPrice: 1 }, 10)).toBe(11);
    });
  });

  describe('placeBid', () => {
    it('should reject amounts that are not positive integers', async () => {
      await expect(service.placeBid(0, 'bob', 0)).rejects.toThrow(BadRequestException);
      await expect(service.placeBid(0, 'bob', 10.5)).rejects.toThrow(BadRequestException);
      expect(balanceService.escrow).not.toHaveBeenCalled();
    });

    it('should accept a first bid at minPrice and start the deadline', async () => {
      withBid(null);
      const before = Date.now();

      const result = await service.placeBid(0, 'bob', 100);

      expect(result.bidder).toBe('bob');
      expect(result.amount).toBe(100);
      expect(result.displaced).toBeNull();
      expect(result.settlement).toBeNull();
      expect(balanceService.escrow).toHaveBeenCalledWith(
        'bob',
        100,
        'bid:0',
        'Bid 100 on asset 0',
        session,
      );
      expect(highestBidModel.findOneAndUpdate).toHaveBeenCalledWith(
        { tokenId: 0 },
        { $set: { bidder: 'bob', amount: 100 } },
        { new: true, upsert: true, session },
      );
      const [, auctionEnd] = listingService.setAuctionEnd.mock.calls[0];
      expect(auctionEnd.getTime()).toBeGreaterThanOrEqual(before + extensionMs);
      expect(auctionEnd.getTime()).toBeLessThanOrEqual(Date.now() + extensionMs);
      expect(valueTransferService.send).not.toHaveBeenCalled();
    });

    it('should throw BidTooLowException below minPrice', async () => {
      withBid(null);

      await expect(service.placeBid(0, 'bob', 99)).rejects.toThrow(
        new BidTooLowException(99, 100),
      );
      expect(balanceService.escrow).not.toHaveBeenCalled();
    });

    it('should throw BidTooLowException below the increment', async () => {
      withBid({ tokenId: 0, bidder: 'bob', amount: 100 });

      await expect(service.placeBid(0, 'carol', 104)).rejects.toThrow(
        'Bid 104 is below the required 105',
      );
    });

    it('should throw AuctionEndedException once the deadline passed', async () => {
      listingService.getListedOrThrow.mockResolvedValueOnce({
        ...openListing,
        auctionEnd: new Date(Date.now() - 1000),
      });

      await expect(service.placeBid(0, 'carol', 500)).rejects.toThrow(AuctionEndedException);
      expect(balanceService.escrow).not.toHaveBeenCalled();
    });

    it('should propagate InsufficientFundsException without touching bid state', async () => {
      withBid(null);
      balanceService.escrow.mockRejectedValueOnce(new InsufficientFundsException('bob', 100, 50));

      await expect(service.placeBid(0, 'bob', 100)).rejects.toThrow(InsufficientFundsException);
      expect(highestBidModel.findOneAndUpdate).not.toHaveBeenCalled();
      expect(listingService.setAuctionEnd).not.toHaveBeenCalled();
    });

    it('should record the new leader before refunding the displaced one', async () => {
      withBid({ tokenId: 0, bidder: 'bob', amount: 100 });
      const order: string[] = [];
      highestBidModel.findOneAndUpdate.mockReturnValue({
        exec: jest.fn(async () => {
          order.push('record');
          return {};
        }),
      });
      valueTransferService.send.mockImplementation(async () => {
        order.push('refund');
        return { ok: true };
      });

      const result = await service.placeBid(0, 'carol', 105);

      expect(order).toEqual(['record', 'refund']);
      expect(result.displaced).toEqual({ account: 'bob', amount: 100, delivered: true });
      expect(valueTransferService.send).toHaveBeenCalledWith(
        'bob',
        100,
        {
          type: LedgerType.REFUND,
          referenceId: 'bid:0',
          description: 'Refund of outbid 100 on asset 0',
        },
        session,
      );
      expect(creditLedgerService.credit).not.toHaveBeenCalled();
    });

    it('should credit the displaced bidder when the refund is not delivered', async () => {
      withBid({ tokenId: 0, bidder: 'bob', amount: 100 });
      valueTransferService.send.mockResolvedValue({ ok: false, reason: 'recipient rejected' });

      const result = await service.placeBid(0, 'carol', 105);

      expect(result.displaced).toEqual({ account: 'bob', amount: 100, delivered: false });
      expect(creditLedgerService.credit).toHaveBeenCalledWith(
        'bob',
        100,
        'bid:0',
        'Refund of outbid 100 on asset 0 (undelivered: recipient rejected)',
        session,
      );
    });

    it('should settle immediately at the buy-now price', async () => {
      highestBidModel.findOne
        .mockReturnValueOnce({
          session: jest.fn().mockReturnValue({ exec: jest.fn().mockResolvedValue(null) }),
        })
        .mockReturnValueOnce({
          session: jest.fn().mockReturnValue({
            exec: jest.fn().mockResolvedValue({ tokenId: 0, bidder: 'bob', amount: 1000 }),
          }),
        });

      const result = await service.placeBid(0, 'bob', 1000);

      expect(result.auctionEnd).toBeNull();
      expect(result.settlement).toEqual({
        tokenId: 0,
        winner: 'bob',
        seller: 'alice',
        amount: 1000,
        proceeds: { account: 'alice', amount: 1000, delivered: true },
      });
      expect(custodyService.transferCustody).toHaveBeenCalledWith(
        0,
        MARKETPLACE_CUSTODY,
        'bob',
        MARKETPLACE_CUSTODY,
        session,
      );
      expect(mockConnection.startSession).toHaveBeenCalledTimes(1);
    });
  });

  describe('settle', () => {
    it('should throw AuctionNotEndedException before the deadline', async () => {
      listingService.getListedOrThrow.mockResolvedValueOnce({
        ...openListing,
        auctionEnd: new Date(Date.now() + 60000),
      });
      withBid({ tokenId: 0, bidder: 'bob', amount: 100 });

      await expect(service.settle(0)).rejects.toThrow(AuctionNotEndedException);
      expect(listingService.closeListing).not.toHaveBeenCalled();
    });

    it('should throw NoBidsException without a bid', async () => {
      withBid(null);

      await expect(service.settle(0)).rejects.toThrow(NoBidsException);
    });

    it('should close the listing before paying the seller', async () => {
      listingService.getListedOrThrow.mockResolvedValueOnce({
        ...openListing,
        auctionEnd: new Date(Date.now() - 1000),
      });
      withBid({ tokenId: 0, bidder: 'bob', amount: 300 });
      const order: string[] = [];
      listingService.closeListing.mockImplementation(async () => {
        order.push('close');
        return {};
      });
      custodyService.transferCustody.mockImplementation(async () => {
        order.push('custody');
        return {};
      });
      valueTransferService.send.mockImplementation(async () => {
        order.push('proceeds');
        return { ok: false, reason: 'account alice does not accept payments' };
      });

      const result = await service.settle(0);

      expect(order).toEqual(['close', 'custody', 'proceeds']);
      expect(highestBidModel.deleteOne).toHaveBeenCalledWith({ tokenId: 0 }, { session });
      expect(result.proceeds).toEqual({ account: 'alice', amount: 300, delivered: false });
      expect(creditLedgerService.credit).toHaveBeenCalledWith(
        'alice',
        300,
        'sale:0',
        'Sale of asset 0 to bob (undelivered: account alice does not accept payments)',
        session,
      );
    });
  });

  describe('getHighestBid', () => {
    it('should return a zero-value record without a bid', async () => {
      withBid(null);

      await expect(service.getHighestBid(4)).resolves.toEqual({
        tokenId: 4,
        bidder: null,
        amount: 0,
      });
    });
  });
});
