/**
 * What a secondary listing sells: one share from the internal ledger,
 * or one token from the token registry
 */
export enum ListingKind {
  LEDGER = 'LEDGER',
  TOKEN = 'TOKEN',
}

/**
 * Listing lifecycle
 * ACTIVE -> COMPLETED (terminal, via execute or cancel)
 */
export enum ListingStatus {
  ACTIVE = 'ACTIVE',
  COMPLETED = 'COMPLETED',
}

export enum ListingOutcome {
  SUCCESSFUL = 'SUCCESSFUL',
  UNSUCCESSFUL = 'UNSUCCESSFUL',
  CANCELLED = 'CANCELLED',
}

/**
 * Listing bid lifecycle
 * ACTIVE -> (WON | REFUNDED)
 */
export enum ListingBidStatus {
  ACTIVE = 'ACTIVE',
  WON = 'WON',
  REFUNDED = 'REFUNDED',
}
