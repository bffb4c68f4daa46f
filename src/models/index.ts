/**
 * Central export for all Mongoose models
 * Import models from here to avoid circular dependencies
 */

export * from './user.schema';
export * from './ledger-entry.schema';
export * from './asset.schema';
export * from './offering-bid.schema';
export * from './holding.schema';
export * from './listing.schema';
export * from './listing-bid.schema';
export * from './token.schema';
export * from './operator-approval.schema';
