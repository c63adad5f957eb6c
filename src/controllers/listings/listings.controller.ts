import {
  Controller,
  Post,
  Get,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  UseGuards,
  ParseIntPipe,
} from '@nestjs/common';
import { Throttle, SkipThrottle } from '@nestjs/throttler';
import { ApiTags, ApiOperation, ApiResponse, ApiParam, ApiBearerAuth } from '@nestjs/swagger';
import { UserDocument } from '../../models/user.schema';
import { CreateListingDto } from '../../dto/create-listing.dto';
import { PlaceBidDto } from '../../dto/place-bid.dto';
import { ListingService } from '../../services/listing/listing.service';
import { AuctionService } from '../../services/auction/auction.service';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';

// листинги, ставки и расчет
@ApiTags('Listings')
@Controller('listings')
export class ListingsController {
  constructor(
    private listingService: ListingService,
    private auctionService: AuctionService,
  ) {}

  @Get()
  @SkipThrottle() // гет-запросы не лимитим
  @ApiOperation({ summary: 'Active listings' })
  async getActiveListings() {
    return this.listingService.getActiveListings();
  }

  @Get(':tokenId')
  @SkipThrottle()
  @ApiOperation({ summary: 'Get listing', description: 'Zero-value record when the asset was never listed' })
  @ApiParam({ name: 'tokenId', example: 0 })
  async getListing(@Param('tokenId', ParseIntPipe) tokenId: number) {
    return this.listingService.getListing(tokenId);
  }

  @Get(':tokenId/highest-bid')
  @SkipThrottle()
  @ApiOperation({ summary: 'Current highest bid', description: 'bidder=null, amount=0 when there is none' })
  @ApiParam({ name: 'tokenId', example: 0 })
  async getHighestBid(@Param('tokenId', ParseIntPipe) tokenId: number) {
    return this.auctionService.getHighestBid(tokenId);
  }

  @Post(':tokenId')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'List an asset', description: 'Moves custody of the asset to the marketplace' })
  @ApiParam({ name: 'tokenId', example: 0 })
  @ApiResponse({ status: 201, description: 'Listed' })
  @ApiResponse({ status: 400, description: 'INVALID_PRICE' })
  @ApiResponse({ status: 403, description: 'NOT_OWNER or TRANSFER_NOT_AUTHORIZED' })
  async list(
    @Param('tokenId', ParseIntPipe) tokenId: number,
    @CurrentUser() user: UserDocument,
    @Body() dto: CreateListingDto,
  ) {
    return this.listingService.list(
      tokenId,
      user._id.toString(),
      dto.minPrice,
      dto.buyNowPrice,
    );
  }

  @Delete(':tokenId')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @ApiOperation({ summary: 'Unlist an asset', description: 'Returns custody to the seller' })
  @ApiParam({ name: 'tokenId', example: 0 })
  @ApiResponse({ status: 403, description: 'NOT_SELLER' })
  @ApiResponse({ status: 409, description: 'NOT_LISTED or BID_OUTSTANDING' })
  async unlist(
    @Param('tokenId', ParseIntPipe) tokenId: number,
    @CurrentUser() user: UserDocument,
  ) {
    return this.listingService.unlist(tokenId, user._id.toString());
  }

  @Post(':tokenId/bids')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @Throttle({ short: { limit: 5, ttl: 1000 } })
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({
    summary: 'Place a bid',
    description: 'Escrows the amount from the caller wallet. The outbid leader is refunded or credited.',
  })
  @ApiParam({ name: 'tokenId', example: 0 })
  @ApiResponse({ status: 400, description: 'BID_TOO_LOW or INSUFFICIENT_FUNDS' })
  @ApiResponse({ status: 409, description: 'NOT_LISTED or AUCTION_ENDED' })
  async placeBid(
    @Param('tokenId', ParseIntPipe) tokenId: number,
    @CurrentUser() user: UserDocument,
    @Body() dto: PlaceBidDto,
  ) {
    return this.auctionService.placeBid(tokenId, user._id.toString(), dto.amount);
  }

  @Post(':tokenId/settle')
  @UseGuards(JwtAuthGuard)
  @ApiBearerAuth()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Settle an auction', description: 'Anyone may settle once the deadline has passed' })
  @ApiParam({ name: 'tokenId', example: 0 })
  @ApiResponse({ status: 409, description: 'NOT_LISTED, NO_BIDS or AUCTION_NOT_ENDED' })
  async settle(@Param('tokenId', ParseIntPipe) tokenId: number) {
    return this.auctionService.settle(tokenId);
  }
}
