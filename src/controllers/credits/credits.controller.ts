import {
  Controller,
  Post,
  Get,
  Param,
  HttpCode,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth } from '@nestjs/swagger';
import { UserDocument } from '../../models/user.schema';
import { ParseMongoIdPipe } from '../../common/pipes/mongo-id.pipe';
import { CreditLedgerService } from '../../services/credit/credit-ledger.service';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';

/**
 * CreditsController
 *
 * Failed-transfer credits. Withdrawal is allowed to the owning account only.
 */
@ApiTags('Credits')
@Controller('credits')
export class CreditsController {
  constructor(private creditLedgerService: CreditLedgerService) {}

  @Get(':account')
  @SkipThrottle()
  @ApiOperation({ summary: 'Credited balance', description: 'Zero when the account never had a failed transfer' })
  @ApiParam({ name: 'account', example: '507f1f77bcf86cd799439011' })
  async getCreditedBalance(@Param('account', ParseMongoIdPipe) account: string) {
    const amount = await this.creditLedgerService.creditedBalance(account);
    return { account, amount };
  }

  // receiver без пайпа: любой чужой id должен получить NOT_RECEIVER
  @Post(':receiver/withdraw')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Withdraw all credits', description: 'Pays out the whole credited balance of the caller' })
  @ApiParam({ name: 'receiver', example: '507f1f77bcf86cd799439011' })
  @ApiResponse({ status: 403, description: 'NOT_RECEIVER' })
  @ApiResponse({ status: 409, description: 'NO_CREDITS' })
  @ApiResponse({ status: 502, description: 'WITHDRAW_FAILED' })
  async withdraw(
    @Param('receiver') receiver: string,
    @CurrentUser() user: UserDocument,
  ) {
    return this.creditLedgerService.withdrawAllFailedCredits(user._id.toString(), receiver);
  }
}
