import {
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { ClientSession, Model, Types } from 'mongoose';
import { OfferingBid, OfferingBidDocument } from '../../models/offering-bid.schema';
import { ListingBid, ListingBidDocument } from '../../models/listing-bid.schema';
import { OfferingBidStatus } from '../../common/enums/offering-bid-status.enum';
import { ClosureOutcome } from '../../common/enums/asset-status.enum';
import { ListingBidStatus } from '../../common/enums/listing.enum';
import { LedgerType } from '../../common/enums/ledger-type.enum';
import { BalanceService } from '../balance/balance.service';
import { HoldingsService } from '../holdings/holdings.service';
import {
  AllocationPlan,
  BidSettlement,
  HolderAllocation,
  ListingBidInput,
} from '../allocation/allocation-engine';

export interface OfferingSettlementTarget {
  assetId: string;
  sellerId: string;
}

export interface ListingSettlementTarget {
  listingId: string;
  sellerId: string;
}

/**
 * SettlementService
 *
 * Executes settlement plans inside the caller's transaction. Bid records are
 * marked settled first (guarded on their pending status), then escrow moves:
 * charged -> seller PROCEEDS, remainder -> bidder REFUND, dust -> seller DUST.
 * Callers flip the subject to its terminal state before calling in.
 */
@Injectable()
export class SettlementService {
  private readonly logger = new Logger(SettlementService.name);

  constructor(
    @InjectModel(OfferingBid.name) private offeringBidModel: Model<OfferingBidDocument>,
    @InjectModel(ListingBid.name) private listingBidModel: Model<ListingBidDocument>,
    private balanceService: BalanceService,
    private holdingsService: HoldingsService,
  ) {}

  async settleOffering(
    target: OfferingSettlementTarget,
    plan: AllocationPlan,
    session: ClientSession,
  ): Promise<void> {
    const { assetId, sellerId } = target;

    await this.markOfferingBidsSettled(plan.settlements, session);

    for (const settlement of plan.settlements) {
      await this.moveOfferingEscrow(sellerId, settlement, session);
    }

    if (plan.outcome === ClosureOutcome.SUCCESSFUL) {
      await this.holdingsService.replaceCapTable(
        assetId,
        withUnsoldToCreator(plan.allocations, sellerId, plan.unitsUnsold),
        session,
      );
    }

    this.logger.log(
      `Settled asset ${assetId} (${plan.outcome}): ${plan.settlements.length} bids, sold ${plan.unitsSold}, unsold ${plan.unitsUnsold}, proceeds ${plan.proceeds}, dust ${plan.dust}`,
    );
  }

  /**
   * Pays the winner's escrow to the seller and refunds every other bid.
   * With no winner every bid is refunded.
   */
  async settleListing(
    target: ListingSettlementTarget,
    bids: readonly ListingBidInput[],
    winner: ListingBidInput | null,
    session: ClientSession,
  ): Promise<void> {
    const { listingId, sellerId } = target;

    if (bids.length > 0) {
      const result = await this.listingBidModel.bulkWrite(
        bids.map((bid) => ({
          updateOne: {
            filter: { _id: new Types.ObjectId(bid.id), status: ListingBidStatus.ACTIVE },
            update: {
              $set: {
                status:
                  winner && bid.id === winner.id
                    ? ListingBidStatus.WON
                    : ListingBidStatus.REFUNDED,
              },
            },
          },
        })),
        { session },
      );
      if (result.matchedCount !== bids.length) {
        throw new InternalServerErrorException(
          `Listing ${listingId}: ${bids.length - result.matchedCount} bids were already settled`,
        );
      }
    }

    for (const bid of bids) {
      if (winner && bid.id === winner.id) {
        await this.balanceService.transferEscrow(
          bid.bidderId,
          sellerId,
          bid.amount,
          LedgerType.PROCEEDS,
          bid.id,
          session,
        );
      } else {
        await this.balanceService.refund(
          bid.bidderId,
          bid.amount,
          bid.id,
          `Refund for listing ${listingId}`,
          session,
        );
      }
    }

    this.logger.log(
      `Settled listing ${listingId}: ${winner ? `won by ${winner.bidderId} at ${winner.amount}` : 'no sale'}, ${bids.length} bids`,
    );
  }

  private async markOfferingBidsSettled(
    settlements: readonly BidSettlement[],
    session: ClientSession,
  ): Promise<void> {
    if (settlements.length === 0) {
      return;
    }

    const settledAt = new Date();
    const result = await this.offeringBidModel.bulkWrite(
      settlements.map((settlement) => ({
        updateOne: {
          filter: {
            _id: new Types.ObjectId(settlement.bidId),
            status: OfferingBidStatus.PENDING,
          },
          update: {
            $set: {
              status: settlement.status,
              allocatedUnits: settlement.allocatedUnits,
              charged: settlement.charged,
              refunded: settlement.refund,
              dust: settlement.dust,
              settledAt,
            },
          },
        },
      })),
      { session },
    );

    // ставка рассчитывается ровно один раз
    if (result.matchedCount !== settlements.length) {
      throw new InternalServerErrorException(
        `${settlements.length - result.matchedCount} bids were already settled`,
      );
    }
  }

  private async moveOfferingEscrow(
    sellerId: string,
    settlement: BidSettlement,
    session: ClientSession,
  ): Promise<void> {
    const { bidId, bidderId, charged, refund, dust } = settlement;

    if (charged > 0) {
      await this.balanceService.transferEscrow(
        bidderId,
        sellerId,
        charged,
        LedgerType.PROCEEDS,
        bidId,
        session,
      );
    }
    if (refund > 0) {
      await this.balanceService.refund(
        bidderId,
        refund,
        bidId,
        `Refund of ${refund} for ${settlement.requestedUnits - settlement.allocatedUnits} unallocated units`,
        session,
      );
    }
    if (dust > 0) {
      await this.balanceService.transferEscrow(
        bidderId,
        sellerId,
        dust,
        LedgerType.DUST,
        bidId,
        session,
      );
    }
  }
}

/**
 * Cap table after a successful closure: bidder allocations plus the unsold
 * units, which stay with the creator
 */
export function withUnsoldToCreator(
  allocations: readonly HolderAllocation[],
  creatorId: string,
  unitsUnsold: number,
): HolderAllocation[] {
  const table = allocations.map((allocation) => ({ ...allocation }));
  if (unitsUnsold <= 0) {
    return table;
  }

  const creatorEntry = table.find((allocation) => allocation.holderId === creatorId);
  if (creatorEntry) {
    creatorEntry.units += unitsUnsold;
  } else {
    table.push({ holderId: creatorId, units: unitsUnsold });
  }
  return table;
}
