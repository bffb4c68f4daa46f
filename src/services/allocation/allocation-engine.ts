import { ClosureOutcome } from '../../common/enums/asset-status.enum';
import { OfferingBidStatus } from '../../common/enums/offering-bid-status.enum';

/**
 * Allocation engine
 *
 * Pure functions, no I/O. Given an offering's bid book and supply, decides
 * the clearing outcome and produces the plan SettlementService executes.
 * Given a listing's bids, picks the single winner.
 *
 * Money is integer minor units throughout; every bid's deposit is split
 * exactly into charged + refund + dust.
 */

export interface OfferingBidInput {
  id: string;
  bidderId: string;
  quantity: number;
  deposit: number;
  unitPrice: number;
  sequence: number;
  status: OfferingBidStatus;
}

export interface OfferingSupply {
  totalUnits: number;
  unitsRemaining: number;
  reservePrice: number;
}

export interface BidSettlement {
  bidId: string;
  bidderId: string;
  requestedUnits: number;
  allocatedUnits: number;
  unitPrice: number;
  /** allocatedUnits * unitPrice, paid to the seller */
  charged: number;
  /** quantity * unitPrice - charged, returned to the bidder */
  refund: number;
  /** deposit - quantity * unitPrice, paid to the seller */
  dust: number;
  status: OfferingBidStatus.ALLOCATED | OfferingBidStatus.REFUNDED;
}

export interface HolderAllocation {
  holderId: string;
  units: number;
}

export interface AllocationPlan {
  outcome: ClosureOutcome;
  totalBidValue: number;
  /** One entry per settled bid: allocation-pass order first, then the refund sweep */
  settlements: BidSettlement[];
  /** New cap table entries for bidders, in first-credit order (successful only) */
  allocations: HolderAllocation[];
  unitsSold: number;
  unitsUnsold: number;
  proceeds: number;
  dust: number;
}

export interface ListingBidInput {
  id: string;
  bidderId: string;
  amount: number;
  sequence: number;
}

/**
 * Deposit value that buys whole units at the implied price
 */
export function bidValue(bid: Pick<OfferingBidInput, 'quantity' | 'unitPrice'>): number {
  return bid.quantity * bid.unitPrice;
}

/**
 * Integer-division remainder of a deposit; never refunded, swept to the seller
 */
export function bidDust(bid: Pick<OfferingBidInput, 'quantity' | 'unitPrice' | 'deposit'>): number {
  return bid.deposit - bidValue(bid);
}

export function impliedUnitPrice(deposit: number, quantity: number): number {
  return Math.floor(deposit / quantity);
}

/**
 * Unit price descending; equal prices keep submission order.
 * Does not mutate its input.
 */
export function rankBids<T extends Pick<OfferingBidInput, 'unitPrice' | 'sequence'>>(
  bids: readonly T[],
): T[] {
  return [...bids].sort((a, b) => {
    if (a.unitPrice !== b.unitPrice) {
      return b.unitPrice - a.unitPrice;
    }
    return a.sequence - b.sequence;
  });
}

/**
 * Valuation pass: what the ranked bids would pay for the units still
 * available, without touching any state
 */
export function valueRankedBids(
  ranked: readonly OfferingBidInput[],
  unitsRemaining: number,
): { totalBidValue: number; unitsCovered: number } {
  let remaining = unitsRemaining;
  let totalBidValue = 0;

  for (const bid of ranked) {
    if (remaining === 0) {
      break;
    }
    const allocatable = Math.min(bid.quantity, remaining);
    remaining -= allocatable;
    totalBidValue += allocatable * bid.unitPrice;
  }

  return { totalBidValue, unitsCovered: unitsRemaining - remaining };
}

function refundInFull(bid: OfferingBidInput): BidSettlement {
  return {
    bidId: bid.id,
    bidderId: bid.bidderId,
    requestedUnits: bid.quantity,
    allocatedUnits: 0,
    unitPrice: bid.unitPrice,
    charged: 0,
    refund: bidValue(bid),
    dust: bidDust(bid),
    status: OfferingBidStatus.REFUNDED,
  };
}

function summarize(
  outcome: ClosureOutcome,
  totalBidValue: number,
  settlements: BidSettlement[],
  allocations: HolderAllocation[],
  totalUnits: number,
): AllocationPlan {
  const unitsSold = settlements.reduce((sum, s) => sum + s.allocatedUnits, 0);
  return {
    outcome,
    totalBidValue,
    settlements,
    allocations,
    unitsSold,
    unitsUnsold: outcome === ClosureOutcome.SUCCESSFUL ? totalUnits - unitsSold : 0,
    proceeds: settlements.reduce((sum, s) => sum + s.charged, 0),
    dust: settlements.reduce((sum, s) => sum + s.dust, 0),
  };
}

/**
 * Plan the closure of a primary offering.
 *
 * Only PENDING bids take part; a bid already settled is never re-evaluated.
 * Successful iff the valuation pass reaches the (aggregate) reserve.
 * Every pending bid appears in exactly one settlement.
 */
export function planOfferingAllocation(
  bids: readonly OfferingBidInput[],
  supply: OfferingSupply,
): AllocationPlan {
  const pending = bids.filter((bid) => bid.status === OfferingBidStatus.PENDING);

  if (pending.length === 0) {
    return summarize(ClosureOutcome.NO_BIDS, 0, [], [], supply.totalUnits);
  }

  const ranked = rankBids(pending);
  const { totalBidValue } = valueRankedBids(ranked, supply.unitsRemaining);

  if (totalBidValue < supply.reservePrice) {
    return summarize(
      ClosureOutcome.FAILED,
      totalBidValue,
      ranked.map(refundInFull),
      [],
      supply.totalUnits,
    );
  }

  const settlements: BidSettlement[] = [];
  const allocations: HolderAllocation[] = [];
  const allocationIndex = new Map<string, HolderAllocation>();
  const visited = new Set<string>();

  // allocation pass: full supply, cap table rebuilt from scratch
  let remaining = supply.totalUnits;
  for (const bid of ranked) {
    if (remaining === 0) {
      break;
    }
    visited.add(bid.id);

    const allocatable = Math.min(bid.quantity, remaining);
    remaining -= allocatable;
    const charged = allocatable * bid.unitPrice;

    settlements.push({
      bidId: bid.id,
      bidderId: bid.bidderId,
      requestedUnits: bid.quantity,
      allocatedUnits: allocatable,
      unitPrice: bid.unitPrice,
      charged,
      refund: bidValue(bid) - charged,
      dust: bidDust(bid),
      status: allocatable > 0 ? OfferingBidStatus.ALLOCATED : OfferingBidStatus.REFUNDED,
    });

    if (allocatable > 0) {
      const existing = allocationIndex.get(bid.bidderId);
      if (existing) {
        existing.units += allocatable;
      } else {
        const entry = { holderId: bid.bidderId, units: allocatable };
        allocationIndex.set(bid.bidderId, entry);
        allocations.push(entry);
      }
    }
  }

  // refund sweep: bids the allocation pass never reached
  for (const bid of ranked) {
    if (!visited.has(bid.id)) {
      settlements.push(refundInFull(bid));
    }
  }

  return summarize(
    ClosureOutcome.SUCCESSFUL,
    totalBidValue,
    settlements,
    allocations,
    supply.totalUnits,
  );
}

/**
 * Plan a cancellation: every pending bid refunded, dust to the seller
 */
export function planOfferingCancellation(bids: readonly OfferingBidInput[]): AllocationPlan {
  const pending = bids.filter((bid) => bid.status === OfferingBidStatus.PENDING);
  return summarize(
    ClosureOutcome.CANCELLED,
    0,
    rankBids(pending).map(refundInFull),
    [],
    0,
  );
}

/**
 * Single-unit winner: highest amount, earliest bid on ties (only a strictly
 * greater amount replaces the current best). Null when there are no bids or
 * the best bid is below the reserve.
 */
export function selectWinningBid<T extends ListingBidInput>(
  bids: readonly T[],
  reservePrice: number,
): T | null {
  const ordered = [...bids].sort((a, b) => a.sequence - b.sequence);

  let best: T | null = null;
  for (const bid of ordered) {
    if (best === null || bid.amount > best.amount) {
      best = bid;
    }
  }

  if (best === null || best.amount < reservePrice) {
    return null;
  }
  return best;
}
