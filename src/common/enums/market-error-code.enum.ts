/**
 * Stable reason codes returned to API clients
 * Clients branch on these, never on the message text
 */
export enum MarketErrorCode {
  NOT_OWNER = 'NOT_OWNER',
  NOT_SELLER = 'NOT_SELLER',
  NOT_LISTED = 'NOT_LISTED',
  BID_TOO_LOW = 'BID_TOO_LOW',
  NOT_RECEIVER = 'NOT_RECEIVER',
  NO_CREDITS = 'NO_CREDITS',
  WITHDRAW_FAILED = 'WITHDRAW_FAILED',
  INVALID_PRICE = 'INVALID_PRICE',
  BID_OUTSTANDING = 'BID_OUTSTANDING',
  AUCTION_ENDED = 'AUCTION_ENDED',
  AUCTION_NOT_ENDED = 'AUCTION_NOT_ENDED',
  NO_BIDS = 'NO_BIDS',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  ASSET_NOT_FOUND = 'ASSET_NOT_FOUND',
  TRANSFER_NOT_AUTHORIZED = 'TRANSFER_NOT_AUTHORIZED',
}
