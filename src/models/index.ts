/**
 * Central export for all Mongoose models
 * Import models from here to avoid circular dependencies
 */

export * from './user.schema';
export * from './asset.schema';
export * from './listing.schema';
export * from './highest-bid.schema';
export * from './credit-entry.schema';
export * from './ledger-entry.schema';
