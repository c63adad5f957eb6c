import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AuctionService } from '../auction/auction.service';
import { ListingService } from '../listing/listing.service';

export interface SettlementRunSummary {
  total: number;
  settled: number;
  failed: number;
}

/**
 * SettlementScheduler
 *
 * Background job that settles auctions whose deadline has passed
 *
 * - Restart-safe: reads persisted listings (listed=true, auctionEnd <= now)
 * - Idempotent: a listing settled elsewhere fails with NotListed and is skipped
 * - One failing listing does not stop the batch
 */
@Injectable()
export class SettlementSchedulerService implements OnModuleInit {
  private readonly logger = new Logger(SettlementSchedulerService.name);
  private readonly cronEnabled: boolean;
  private readonly batchSize: number;
  private running = false;

  constructor(
    private listingService: ListingService,
    private auctionService: AuctionService,
    private configService: ConfigService,
  ) {
    this.cronEnabled = this.configService.get<boolean>('settlement.cronEnabled', true);
    this.batchSize = this.configService.get<number>('settlement.batchSize', 50);
  }

  onModuleInit() {
    this.logger.log({
      action: 'scheduler-initialized',
      service: 'SettlementSchedulerService',
      cronEnabled: this.cronEnabled,
      batchSize: this.batchSize,
    }, 'SettlementScheduler initialized');
  }

  @Cron(CronExpression.EVERY_10_SECONDS, {
    name: 'settle-auctions',
  })
  async settleJob() {
    if (!this.cronEnabled) {
      return;
    }

    // предыдущий запуск еще идет
    if (this.running) {
      this.logger.debug({ job: 'settle-auctions', action: 'skip' }, 'Previous run still active');
      return;
    }

    this.running = true;
    const jobStartTime = Date.now();
    try {
      const summary = await this.settleDue();
      if (summary.total > 0) {
        this.logger.log({
          job: 'settle-auctions',
          action: 'complete',
          ...summary,
          durationMs: Date.now() - jobStartTime,
        }, `Settlement job completed: ${summary.settled} settled, ${summary.failed} failed`);
      }
    } catch (error) {
      this.logger.error({
        job: 'settle-auctions',
        action: 'error',
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      }, 'Error in settleJob');
      // следующий запуск повторит
    } finally {
      this.running = false;
    }
  }

  /**
   * Settle every listing whose auction deadline has passed
   * Also used as a manual trigger
   */
  async settleDue(now: Date = new Date()): Promise<SettlementRunSummary> {
    const due = await this.listingService.findDueForSettlement(now, this.batchSize);

    let settled = 0;
    let failed = 0;
    for (const listing of due) {
      try {
        await this.auctionService.settle(listing.tokenId);
        settled++;
      } catch (error) {
        failed++;
        this.logger.error({
          job: 'settle-auctions',
          action: 'settle-listing',
          tokenId: listing.tokenId,
          error: error instanceof Error ? error.message : String(error),
        }, `Failed to settle asset ${listing.tokenId}`);
      }
    }

    return { total: due.length, settled, failed };
  }
}
