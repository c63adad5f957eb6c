import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { SettlementSchedulerService } from './settlement-scheduler.service';
import { AuctionModule } from '../auction/auction.module';
import { ListingModule } from '../listing/listing.module';

/**
 * SchedulerModule
 *
 * Provides SettlementSchedulerService for automatic auction settlement
 * Uses @nestjs/schedule for cron jobs
 */
@Module({
  imports: [
    ScheduleModule.forRoot(),
    AuctionModule,
    ListingModule,
  ],
  providers: [SettlementSchedulerService],
  exports: [SettlementSchedulerService],
})
export class SchedulerModule {}
