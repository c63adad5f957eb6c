import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { User, UserSchema } from '../../models/user.schema';
import { PAYMENT_GATEWAY } from '../../common/constants';
import { BalanceModule } from '../balance/balance.module';
import { ValueTransferService } from './value-transfer.service';
import { WalletPaymentGateway } from './wallet-payment.gateway';

/**
 * TransferModule
 *
 * Provides ValueTransferService backed by the wallet payment gateway
 */
@Module({
  imports: [
    MongooseModule.forFeature([{ name: User.name, schema: UserSchema }]),
    BalanceModule,
  ],
  providers: [
    ValueTransferService,
    { provide: PAYMENT_GATEWAY, useClass: WalletPaymentGateway },
  ],
  exports: [ValueTransferService],
})
export class TransferModule {}
