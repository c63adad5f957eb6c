import {
  Controller,
  Post,
  Get,
  Patch,
  Body,
  Query,
  HttpCode,
  HttpStatus,
  UseGuards,
  DefaultValuePipe,
  ParseIntPipe,
} from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth, ApiQuery } from '@nestjs/swagger';
import { UserDocument } from '../../models/user.schema';
import { DepositDto } from '../../dto/deposit.dto';
import { PaymentSettingsDto } from '../../dto/payment-settings.dto';
import { BalanceService } from '../../services/balance/balance.service';
import { AuthService } from '../../auth/auth.service';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';

/**
 * UsersController
 *
 * Wallet of the authenticated account
 */
@ApiTags('Users')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('users/me')
export class UsersController {
  constructor(
    private balanceService: BalanceService,
    private authService: AuthService,
  ) {}

  @Post('deposit')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Deposit into wallet', description: 'Adds value to the caller wallet, recorded as DEPOSIT' })
  @ApiResponse({ status: 200, description: 'Deposit applied' })
  @ApiResponse({ status: 400, description: 'Invalid amount' })
  async deposit(@CurrentUser() user: UserDocument, @Body() dto: DepositDto) {
    const updated = await this.balanceService.deposit(
      user._id.toString(),
      dto.amount,
      dto.description,
    );
    return this.authService.toAccountView(updated);
  }

  @Get('ledger')
  @SkipThrottle()
  @ApiOperation({ summary: 'Wallet audit trail', description: 'Most recent ledger entries of the caller first' })
  @ApiQuery({ name: 'limit', required: false, example: 50 })
  async getLedger(
    @CurrentUser() user: UserDocument,
    @Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit: number,
  ) {
    const entries = await this.balanceService.getLedgerHistory(
      user._id.toString(),
      Math.min(Math.max(limit, 1), 500),
    );

    return entries.map((entry) => ({
      id: entry._id.toString(),
      type: entry.type,
      amount: entry.amount,
      referenceId: entry.referenceId,
      description: entry.description,
      createdAt: entry.createdAt,
    }));
  }

  @Patch('payments')
  @ApiOperation({
    summary: 'Payment settings',
    description: 'With acceptsPayments=false direct transfers to the caller fail and are credited instead',
  })
  async setPaymentSettings(
    @CurrentUser() user: UserDocument,
    @Body() dto: PaymentSettingsDto,
  ) {
    return this.authService.setAcceptsPayments(user._id.toString(), dto.acceptsPayments);
  }
}
