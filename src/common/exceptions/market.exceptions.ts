import { HttpException, HttpStatus } from '@nestjs/common';
import { MarketErrorCode } from '../enums/market-error-code.enum';

/**
 * Base class for every marketplace rule violation
 *
 * Carries a stable `code` next to the HTTP status so the filter can render
 * a specific reason instead of a generic failure.
 */
export class MarketException extends HttpException {
  constructor(
    readonly code: MarketErrorCode,
    message: string,
    status: HttpStatus,
  ) {
    super({ statusCode: status, code, message }, status);
  }
}

export class NotOwnerException extends MarketException {
  constructor(tokenId: number, account: string) {
    super(
      MarketErrorCode.NOT_OWNER,
      `Account ${account} does not own asset ${tokenId}`,
      HttpStatus.FORBIDDEN,
    );
  }
}

export class NotSellerException extends MarketException {
  constructor(tokenId: number, account: string) {
    super(
      MarketErrorCode.NOT_SELLER,
      `Account ${account} is not the seller of asset ${tokenId}`,
      HttpStatus.FORBIDDEN,
    );
  }
}

export class NotListedException extends MarketException {
  constructor(tokenId: number) {
    super(
      MarketErrorCode.NOT_LISTED,
      `Asset ${tokenId} is not listed`,
      HttpStatus.CONFLICT,
    );
  }
}

export class BidTooLowException extends MarketException {
  constructor(amount: number, required: number) {
    super(
      MarketErrorCode.BID_TOO_LOW,
      `Bid ${amount} is below the required ${required}`,
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class NotReceiverException extends MarketException {
  constructor(caller: string, receiver: string) {
    super(
      MarketErrorCode.NOT_RECEIVER,
      `Account ${caller} cannot withdraw credits of ${receiver}`,
      HttpStatus.FORBIDDEN,
    );
  }
}

export class NoCreditsException extends MarketException {
  constructor(account: string) {
    super(
      MarketErrorCode.NO_CREDITS,
      `Account ${account} has no credits to withdraw`,
      HttpStatus.CONFLICT,
    );
  }
}

export class WithdrawFailedException extends MarketException {
  constructor(account: string, reason: string) {
    super(
      MarketErrorCode.WITHDRAW_FAILED,
      `Withdrawal to ${account} failed: ${reason}`,
      HttpStatus.BAD_GATEWAY,
    );
  }
}

export class InvalidPriceException extends MarketException {
  constructor(message: string) {
    super(MarketErrorCode.INVALID_PRICE, message, HttpStatus.BAD_REQUEST);
  }
}

export class BidOutstandingException extends MarketException {
  constructor(tokenId: number) {
    super(
      MarketErrorCode.BID_OUTSTANDING,
      `Asset ${tokenId} has an outstanding bid and cannot be unlisted`,
      HttpStatus.CONFLICT,
    );
  }
}

export class AuctionEndedException extends MarketException {
  constructor(tokenId: number, auctionEnd: Date) {
    super(
      MarketErrorCode.AUCTION_ENDED,
      `Auction for asset ${tokenId} ended at ${auctionEnd.toISOString()}`,
      HttpStatus.CONFLICT,
    );
  }
}

export class AuctionNotEndedException extends MarketException {
  constructor(tokenId: number, auctionEnd: Date) {
    super(
      MarketErrorCode.AUCTION_NOT_ENDED,
      `Auction for asset ${tokenId} runs until ${auctionEnd.toISOString()}`,
      HttpStatus.CONFLICT,
    );
  }
}

export class NoBidsException extends MarketException {
  constructor(tokenId: number) {
    super(
      MarketErrorCode.NO_BIDS,
      `Asset ${tokenId} has no bids to settle`,
      HttpStatus.CONFLICT,
    );
  }
}

export class InsufficientFundsException extends MarketException {
  constructor(account: string, requested: number, available: number) {
    super(
      MarketErrorCode.INSUFFICIENT_FUNDS,
      `Insufficient balance for ${account}: requested ${requested}, available ${available}`,
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class AssetNotFoundException extends MarketException {
  constructor(tokenId: number) {
    super(
      MarketErrorCode.ASSET_NOT_FOUND,
      `Asset ${tokenId} not found`,
      HttpStatus.NOT_FOUND,
    );
  }
}

export class TransferNotAuthorizedException extends MarketException {
  constructor(tokenId: number, operator: string) {
    super(
      MarketErrorCode.TRANSFER_NOT_AUTHORIZED,
      `Operator ${operator} is not approved to move asset ${tokenId}`,
      HttpStatus.FORBIDDEN,
    );
  }
}
