import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { Connection, Model } from 'mongoose';
import { Asset, AssetDocument } from '../../models/asset.schema';
import { HoldingDocument } from '../../models/holding.schema';
import { AssetStatus, ClosureOutcome } from '../../common/enums/asset-status.enum';
import { Actor, assertCreatorOrOperator } from '../../common/auth/actor';
import { assertAmount, assertNonNegativeAmount } from '../../common/utils/money';
import { rethrowAsHttp, runInTransaction } from '../../common/utils/transaction';
import { BidBookService, toOfferingBidInput } from '../bid-book/bid-book.service';
import { HoldingsService } from '../holdings/holdings.service';
import { SettlementService } from '../settlement/settlement.service';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import {
  AllocationPlan,
  OfferingBidInput,
  planOfferingAllocation,
  planOfferingCancellation,
} from '../allocation/allocation-engine';

export interface CreateOfferingParams {
  name: string;
  description?: string;
  totalUnits: number;
  reservePrice: number;
  biddingEndsAt?: Date;
}

type ClosureKind = 'early' | 'deadline' | 'cancel';

/**
 * OfferingService
 *
 * Lifecycle of a primary offering: OPEN -> CLOSED with one of the closure
 * outcomes. Every closure runs under the asset lock in one transaction and
 * flips the asset to CLOSED (conditional on OPEN) before any bid, balance
 * or holding is touched.
 */
@Injectable()
export class OfferingService {
  private readonly logger = new Logger(OfferingService.name);

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(Asset.name) private assetModel: Model<AssetDocument>,
    private bidBookService: BidBookService,
    private holdingsService: HoldingsService,
    private settlementService: SettlementService,
    private redisLockService: RedisLockService,
  ) {}

  /**
   * Creates the asset; the creator holds every unit until a successful closure
   */
  async createOffering(actor: Actor, params: CreateOfferingParams): Promise<AssetDocument> {
    assertAmount(params.totalUnits, 'totalUnits');
    assertNonNegativeAmount(params.reservePrice, 'reservePrice');
    if (params.biddingEndsAt && params.biddingEndsAt.getTime() <= Date.now()) {
      throw new BadRequestException('biddingEndsAt must be in the future');
    }

    try {
      const asset = await runInTransaction(this.connection, undefined, async (tx) => {
        const [created] = await this.assetModel.create(
          [
            {
              name: params.name,
              description: params.description,
              createdBy: actor.id,
              totalUnits: params.totalUnits,
              unitsRemaining: params.totalUnits,
              reservePrice: params.reservePrice,
              biddingEndsAt: params.biddingEndsAt,
              status: AssetStatus.OPEN,
              bidCount: 0,
            },
          ],
          { session: tx },
        );

        await this.holdingsService.issue(
          created._id.toString(),
          actor.id,
          params.totalUnits,
          tx,
        );
        return created;
      });

      this.logger.log(
        `Created offering ${asset._id.toString()} by ${actor.id}: ${params.totalUnits} units, reserve ${params.reservePrice}`,
      );
      return asset;
    } catch (error) {
      rethrowAsHttp(this.logger, error, 'creating offering');
    }
  }

  /**
   * Creator or operator closes the offering before (or without) a deadline
   */
  async closeEarly(actor: Actor, assetId: string): Promise<AssetDocument> {
    return this.finalize(actor, assetId, 'early');
  }

  /**
   * Anyone may close once the bidding deadline has passed
   */
  async closeAtDeadline(actor: Actor, assetId: string): Promise<AssetDocument> {
    return this.finalize(actor, assetId, 'deadline');
  }

  /**
   * Creator or operator withdraws the offering; every bid is refunded
   */
  async cancelOffering(actor: Actor, assetId: string): Promise<AssetDocument> {
    return this.finalize(actor, assetId, 'cancel');
  }

  async getAsset(assetId: string): Promise<AssetDocument> {
    const asset = await this.assetModel.findById(assetId).exec();
    if (!asset) {
      throw new NotFoundException(`Asset with ID ${assetId} not found`);
    }
    return asset;
  }

  async listAssets(status?: AssetStatus, limit = 50): Promise<AssetDocument[]> {
    const filter = status ? { status } : {};
    return this.assetModel.find(filter).sort({ createdAt: -1 }).limit(limit).exec();
  }

  async getHolders(assetId: string): Promise<HoldingDocument[]> {
    await this.getAsset(assetId);
    return this.holdingsService.getHolders(assetId);
  }

  /**
   * Open offerings whose deadline has passed, oldest deadline first
   */
  async findExpiredOpenAssetIds(now: Date, limit: number): Promise<string[]> {
    const assets = await this.assetModel
      .find({ status: AssetStatus.OPEN, biddingEndsAt: { $lte: now } })
      .sort({ biddingEndsAt: 1 })
      .limit(limit)
      .select('_id')
      .exec();
    return assets.map((asset) => asset._id.toString());
  }

  private async finalize(
    actor: Actor,
    assetId: string,
    kind: ClosureKind,
  ): Promise<AssetDocument> {
    return this.redisLockService.withLock(`asset:${assetId}`, async () => {
      try {
        return await runInTransaction(this.connection, undefined, async (tx) => {
          const asset = await this.assetModel.findById(assetId).session(tx).exec();
          if (!asset) {
            throw new NotFoundException(`Asset with ID ${assetId} not found`);
          }

          this.authorizeClosure(actor, asset, kind);

          const pendingBids = await this.bidBookService.getPendingBids(assetId, tx);
          const plan = this.planClosure(asset, kind, pendingBids.map(toOfferingBidInput));

          // сначала фиксируем состояние, потом двигаем деньги
          const closed = await this.assetModel
            .findOneAndUpdate(
              { _id: assetId, status: AssetStatus.OPEN },
              {
                $set: {
                  status: AssetStatus.CLOSED,
                  outcome: plan.outcome,
                  unitsRemaining:
                    plan.outcome === ClosureOutcome.SUCCESSFUL
                      ? plan.unitsUnsold
                      : asset.unitsRemaining,
                  totalBidValue: plan.totalBidValue,
                  proceeds: plan.proceeds,
                  dust: plan.dust,
                  closedAt: new Date(),
                  closedBy: actor.id,
                },
              },
              { new: true, session: tx },
            )
            .exec();

          if (!closed) {
            throw new ConflictException(`Offering ${assetId} is already closed`);
          }

          await this.settlementService.settleOffering(
            { assetId, sellerId: asset.createdBy },
            plan,
            tx,
          );

          this.logger.log(
            `Offering ${assetId} closed (${kind}) by ${actor.id}: ${plan.outcome}, bid value ${plan.totalBidValue} vs reserve ${asset.reservePrice}`,
          );
          return closed;
        });
      } catch (error) {
        rethrowAsHttp(this.logger, error, `closing offering ${assetId}`);
      }
    });
  }

  private authorizeClosure(actor: Actor, asset: AssetDocument, kind: ClosureKind): void {
    if (kind === 'deadline') {
      if (!asset.biddingEndsAt) {
        throw new BadRequestException(
          `Offering ${asset._id.toString()} has no deadline; it closes by its creator`,
        );
      }
    } else {
      assertCreatorOrOperator(
        actor,
        asset.createdBy,
        kind === 'cancel' ? 'cancel this offering' : 'close this offering',
      );
    }

    if (asset.status !== AssetStatus.OPEN) {
      throw new ConflictException(`Offering ${asset._id.toString()} is already closed`);
    }

    if (
      kind === 'deadline' &&
      asset.biddingEndsAt &&
      Date.now() < asset.biddingEndsAt.getTime()
    ) {
      throw new ConflictException(
        `Bidding on offering ${asset._id.toString()} ends at ${asset.biddingEndsAt.toISOString()}`,
      );
    }
  }

  private planClosure(
    asset: AssetDocument,
    kind: ClosureKind,
    bids: OfferingBidInput[],
  ): AllocationPlan {
    if (kind === 'cancel') {
      return planOfferingCancellation(bids);
    }
    return planOfferingAllocation(bids, {
      totalUnits: asset.totalUnits,
      unitsRemaining: asset.unitsRemaining,
      reservePrice: asset.reservePrice,
    });
  }
}
