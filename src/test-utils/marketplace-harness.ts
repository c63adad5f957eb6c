import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { getConnectionToken, getModelToken } from '@nestjs/mongoose';
import { ClientSession } from 'mongoose';
import { User } from '../models/user.schema';
import { LedgerEntry } from '../models/ledger-entry.schema';
import { Asset } from '../models/asset.schema';
import { Listing } from '../models/listing.schema';
import { HighestBid } from '../models/highest-bid.schema';
import { CreditEntry } from '../models/credit-entry.schema';
import { MARKETPLACE_CUSTODY, PAYMENT_GATEWAY } from '../common/constants';
import { BalanceService } from '../services/balance/balance.service';
import { CreditLedgerService } from '../services/credit/credit-ledger.service';
import { AssetCustodyService } from '../services/custody/asset-custody.service';
import { ListingService } from '../services/listing/listing.service';
import { AuctionService } from '../services/auction/auction.service';
import { SettlementSchedulerService } from '../services/scheduler/settlement-scheduler.service';
import { RedisLockService } from '../services/redis-lock/redis-lock.service';
import { ValueTransferService } from '../services/transfer/value-transfer.service';
import { WalletPaymentGateway } from '../services/transfer/wallet-payment.gateway';
import { TransferContext, TransferResult } from '../services/transfer/transfer.types';
import { InMemoryConnection, InMemoryModel } from './in-memory-mongoose';

export const TEST_EXTENSION_MS = 15 * 60 * 1000;

export interface MarketClock {
  advance(ms: number): void;
  restore(): void;
}

/**
 * Fake Date only, timers and microtasks stay real so the Nest module keeps working
 */
export function useMarketClock(start: Date): MarketClock {
  jest.useFakeTimers({
    now: start,
    doNotFake: [
      'hrtime',
      'nextTick',
      'performance',
      'queueMicrotask',
      'setImmediate',
      'clearImmediate',
      'setInterval',
      'clearInterval',
      'setTimeout',
      'clearTimeout',
    ],
  });

  return {
    advance(ms) {
      jest.setSystemTime(Date.now() + ms);
    },
    restore() {
      jest.useRealTimers();
    },
  };
}

/**
 * Wallet gateway with test hooks:
 * - beforeDeliver runs while the transfer is in flight (re-entrancy)
 * - failNext makes the next deliveries fail regardless of the recipient
 */
@Injectable()
export class HookedPaymentGateway extends WalletPaymentGateway {
  beforeDeliver: ((to: string, amount: number, context: TransferContext) => Promise<void>) | null =
    null;
  failNext = 0;
  deliveries: Array<{ to: string; amount: number; type: string }> = [];

  async deliver(
    to: string,
    amount: number,
    context: TransferContext,
    session: ClientSession,
  ): Promise<TransferResult> {
    this.deliveries.push({ to, amount, type: context.type });

    if (this.beforeDeliver) {
      await this.beforeDeliver(to, amount, context);
    }

    if (this.failNext > 0) {
      this.failNext -= 1;
      return { ok: false, reason: 'gateway unavailable' };
    }

    return super.deliver(to, amount, context, session);
  }
}

export interface MarketplaceHarness {
  module: TestingModule;
  connection: InMemoryConnection;
  models: {
    users: InMemoryModel;
    ledgerEntries: InMemoryModel;
    assets: InMemoryModel;
    listings: InMemoryModel;
    highestBids: InMemoryModel;
    creditEntries: InMemoryModel;
  };
  gateway: HookedPaymentGateway;
  balanceService: BalanceService;
  creditLedgerService: CreditLedgerService;
  custodyService: AssetCustodyService;
  listingService: ListingService;
  auctionService: AuctionService;
  schedulerService: SettlementSchedulerService;
  createAccount(username: string, balance: number, acceptsPayments?: boolean): Promise<string>;
  balanceOf(account: string): Promise<number>;
  /** wallets + escrowed bids + outstanding credits */
  totalValue(): number;
  listNewAsset(seller: string, minPrice: number, buyNowPrice: number): Promise<number>;
}

export async function createMarketplaceHarness(): Promise<MarketplaceHarness> {
  const connection = new InMemoryConnection();
  const models = {
    users: new InMemoryModel(connection, 'users', {
      defaults: { balance: 0, acceptsPayments: true },
      hidden: ['password'],
    }),
    ledgerEntries: new InMemoryModel(connection, 'ledger_entries'),
    assets: new InMemoryModel(connection, 'assets', { defaults: { approved: null } }),
    listings: new InMemoryModel(connection, 'listings', {
      defaults: { listed: false, auctionEnd: null },
    }),
    highestBids: new InMemoryModel(connection, 'highest_bids'),
    creditEntries: new InMemoryModel(connection, 'credit_entries', { defaults: { amount: 0 } }),
  };

  const module = await Test.createTestingModule({
    providers: [
      BalanceService,
      ValueTransferService,
      CreditLedgerService,
      AssetCustodyService,
      ListingService,
      AuctionService,
      SettlementSchedulerService,
      HookedPaymentGateway,
      { provide: PAYMENT_GATEWAY, useExisting: HookedPaymentGateway },
      { provide: getConnectionToken(), useValue: connection },
      { provide: getModelToken(User.name), useValue: models.users },
      { provide: getModelToken(LedgerEntry.name), useValue: models.ledgerEntries },
      { provide: getModelToken(Asset.name), useValue: models.assets },
      { provide: getModelToken(Listing.name), useValue: models.listings },
      { provide: getModelToken(HighestBid.name), useValue: models.highestBids },
      { provide: getModelToken(CreditEntry.name), useValue: models.creditEntries },
      {
        provide: RedisLockService,
        useValue: {
          withLock: <T>(_key: string, fn: () => Promise<T>) => fn(),
          isLockServiceAvailable: () => false,
        },
      },
      {
        provide: ConfigService,
        useValue: new ConfigService({
          auction: { extensionMs: TEST_EXTENSION_MS, minIncrementPct: 5 },
          settlement: { cronEnabled: false, batchSize: 50 },
        }),
      },
    ],
  }).compile();

  const custodyService = module.get(AssetCustodyService);
  const listingService = module.get(ListingService);

  return {
    module,
    connection,
    models,
    gateway: module.get(HookedPaymentGateway),
    balanceService: module.get(BalanceService),
    creditLedgerService: module.get(CreditLedgerService),
    custodyService,
    listingService,
    auctionService: module.get(AuctionService),
    schedulerService: module.get(SettlementSchedulerService),

    async createAccount(username, balance, acceptsPayments = true) {
      const user = await models.users.create({ username, balance, acceptsPayments });
      return String(user._id);
    },

    async balanceOf(account) {
      const user = await models.users.findById(account).exec();
      return typeof user?.balance === 'number' ? user.balance : 0;
    },

    totalValue() {
      const sum = (docs: Array<Record<string, unknown>>, field: string) =>
        docs.reduce((total, doc) => {
          const value = doc[field];
          return total + (typeof value === 'number' ? value : 0);
        }, 0);

      return (
        sum(models.users.all(), 'balance') +
        sum(models.highestBids.all(), 'amount') +
        sum(models.creditEntries.all(), 'amount')
      );
    },

    async listNewAsset(seller, minPrice, buyNowPrice) {
      const asset = await custodyService.mint(seller);
      await custodyService.approve(asset.tokenId, seller, MARKETPLACE_CUSTODY);
      await listingService.list(asset.tokenId, seller, minPrice, buyNowPrice);
      return asset.tokenId;
    },
  };
}
