/**
 * Primary offering lifecycle
 * State machine: OPEN -> CLOSED (never reopens)
 */
export enum AssetStatus {
  OPEN = 'OPEN',
  CLOSED = 'CLOSED',
}

/**
 * How a closed offering ended
 * Set once, in the same write that moves the asset to CLOSED
 */
export enum ClosureOutcome {
  SUCCESSFUL = 'SUCCESSFUL', // aggregate bid value met the reserve, cap table replaced
  FAILED = 'FAILED', // reserve not met, every bid refunded
  NO_BIDS = 'NO_BIDS', // nothing to settle
  CANCELLED = 'CANCELLED', // withdrawn by creator/operator, every bid refunded
}
