import {
  Controller,
  Post,
  Get,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  UseGuards,
  ParseIntPipe,
} from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth } from '@nestjs/swagger';
import { UserDocument } from '../../models/user.schema';
import { ApproveAssetDto } from '../../dto/approve-asset.dto';
import { MARKETPLACE_CUSTODY } from '../../common/constants';
import { AssetCustodyService } from '../../services/custody/asset-custody.service';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';

// активы: выпуск, approve, владелец
@ApiTags('Assets')
@Controller('assets')
export class AssetsController {
  constructor(private custodyService: AssetCustodyService) {}

  @Post()
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Mint an asset', description: 'Creates a new asset owned by the caller' })
  @ApiResponse({ status: 201, description: 'Asset minted' })
  async mint(@CurrentUser() user: UserDocument) {
    return this.custodyService.mint(user._id.toString());
  }

  @Post(':tokenId/approve')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Approve an operator', description: 'Needed before listing: approve the marketplace to take custody' })
  @ApiParam({ name: 'tokenId', example: 0 })
  @ApiResponse({ status: 403, description: 'NOT_OWNER' })
  @ApiResponse({ status: 404, description: 'ASSET_NOT_FOUND' })
  async approve(
    @Param('tokenId', ParseIntPipe) tokenId: number,
    @CurrentUser() user: UserDocument,
    @Body() dto: ApproveAssetDto,
  ) {
    return this.custodyService.approve(
      tokenId,
      user._id.toString(),
      dto.operator ?? MARKETPLACE_CUSTODY,
    );
  }

  @Get(':tokenId')
  @SkipThrottle()
  @ApiOperation({ summary: 'Get asset', description: 'Current owner and approved operator' })
  @ApiParam({ name: 'tokenId', example: 0 })
  @ApiResponse({ status: 404, description: 'ASSET_NOT_FOUND' })
  async getAsset(@Param('tokenId', ParseIntPipe) tokenId: number) {
    return this.custodyService.getAsset(tokenId);
  }
}
