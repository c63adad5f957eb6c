import { Module } from '@nestjs/common';
import { UsersController } from '../controllers/users/users.controller';
import { AssetsController } from '../controllers/assets/assets.controller';
import { ListingsController } from '../controllers/listings/listings.controller';
import { CreditsController } from '../controllers/credits/credits.controller';
import { AuthModule } from '../auth/auth.module';
import { BalanceModule } from '../services/balance/balance.module';
import { CustodyModule } from '../services/custody/custody.module';
import { ListingModule } from '../services/listing/listing.module';
import { AuctionModule } from '../services/auction/auction.module';
import { CreditModule } from '../services/credit/credit.module';

/**
 * ApiModule
 *
 * Provides REST API controllers
 * Aggregates all service modules
 */
@Module({
  imports: [
    AuthModule,
    BalanceModule,
    CustodyModule,
    ListingModule,
    AuctionModule,
    CreditModule,
  ],
  controllers: [UsersController, AssetsController, ListingsController, CreditsController],
})
export class ApiModule {}
