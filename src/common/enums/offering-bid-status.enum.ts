/**
 * Offering bid lifecycle
 * PENDING -> (ALLOCATED | REFUNDED)
 * A bid is settled by exactly one closure pass and never revisited
 */
export enum OfferingBidStatus {
  PENDING = 'PENDING',
  ALLOCATED = 'ALLOCATED', // received at least one unit, may carry a partial refund
  REFUNDED = 'REFUNDED', // received nothing, deposit returned
}
