import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { ClientSession, Connection, Model } from 'mongoose';
import { Asset, AssetDocument } from '../../models/asset.schema';
import { Listing, ListingDocument } from '../../models/listing.schema';
import { ListingBid, ListingBidDocument } from '../../models/listing-bid.schema';
import { AssetStatus } from '../../common/enums/asset-status.enum';
import {
  ListingBidStatus,
  ListingKind,
  ListingOutcome,
  ListingStatus,
} from '../../common/enums/listing.enum';
import { Actor, assertCreatorOrOperator, isOperator } from '../../common/auth/actor';
import { assertAmount, assertNonNegativeAmount } from '../../common/utils/money';
import { rethrowAsHttp, runInTransaction } from '../../common/utils/transaction';
import { BalanceService } from '../balance/balance.service';
import { HoldingsService } from '../holdings/holdings.service';
import { SettlementService } from '../settlement/settlement.service';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import {
  MARKETPLACE_OPERATOR,
  TOKEN_REGISTRY,
  TokenRegistry,
} from '../token-registry/token-registry.interface';
import { ListingBidInput, selectWinningBid } from '../allocation/allocation-engine';

export type CreateListingParams =
  | { kind: ListingKind.LEDGER; assetId: string; reservePrice: number; endsAt?: Date }
  | { kind: ListingKind.TOKEN; tokenId: number; reservePrice: number; endsAt?: Date };

export interface ListingFilter {
  status?: ListingStatus;
  kind?: ListingKind;
  assetId?: string;
  sellerId?: string;
}

function toListingBidInput(bid: ListingBidDocument): ListingBidInput {
  return {
    id: bid._id.toString(),
    bidderId: bid.bidderId,
    amount: bid.amount,
    sequence: bid.sequence,
  };
}

/**
 * MarketService
 *
 * Secondary single-unit auctions over ledger shares and registry tokens.
 * ACTIVE -> COMPLETED via execute (highest bid at or above the reserve wins)
 * or cancel. The listing is completed before any unit or escrow moves.
 */
@Injectable()
export class MarketService {
  private readonly logger = new Logger(MarketService.name);
  private readonly maxBids: number;

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(Listing.name) private listingModel: Model<ListingDocument>,
    @InjectModel(ListingBid.name) private listingBidModel: Model<ListingBidDocument>,
    @InjectModel(Asset.name) private assetModel: Model<AssetDocument>,
    @Inject(TOKEN_REGISTRY) private tokenRegistry: TokenRegistry,
    private holdingsService: HoldingsService,
    private balanceService: BalanceService,
    private settlementService: SettlementService,
    private redisLockService: RedisLockService,
    private configService: ConfigService,
  ) {
    this.maxBids = this.configService.get<number>('auction.maxBidsPerSubject', 500);
  }

  async createListing(actor: Actor, params: CreateListingParams): Promise<ListingDocument> {
    assertNonNegativeAmount(params.reservePrice, 'reservePrice');
    if (params.endsAt && params.endsAt.getTime() <= Date.now()) {
      throw new BadRequestException('endsAt must be in the future');
    }

    // LEDGER листинги под локом актива: пересекаются с переводами долей
    const lockKey =
      params.kind === ListingKind.LEDGER
        ? `asset:${params.assetId}`
        : `token:${params.tokenId}`;

    return this.redisLockService.withLock(lockKey, async () => {
      try {
        const listing = await runInTransaction(this.connection, undefined, async (tx) => {
          if (params.kind === ListingKind.LEDGER) {
            await this.assertLedgerListable(actor, params.assetId, tx);
          } else {
            await this.assertTokenListable(actor, params.tokenId, tx);
          }

          const [created] = await this.listingModel.create(
            [
              {
                kind: params.kind,
                assetId: params.kind === ListingKind.LEDGER ? params.assetId : undefined,
                tokenId: params.kind === ListingKind.TOKEN ? params.tokenId : undefined,
                sellerId: actor.id,
                reservePrice: params.reservePrice,
                endsAt: params.endsAt,
                status: ListingStatus.ACTIVE,
                bidCount: 0,
              },
            ],
            { session: tx },
          );
          return created;
        });

        this.logger.log(
          `Listing ${listing._id.toString()} created by ${actor.id}: ${params.kind} reserve ${params.reservePrice}`,
        );
        return listing;
      } catch (error) {
        rethrowAsHttp(this.logger, error, 'creating listing');
      }
    });
  }

  async placeBid(actor: Actor, listingId: string, amount: number): Promise<ListingBidDocument> {
    assertAmount(amount, 'Amount');

    return this.redisLockService.withLock(`listing:${listingId}`, async () => {
      try {
        return await runInTransaction(this.connection, undefined, async (tx) => {
          const listing = await this.findListing(listingId, tx);

          if (listing.status !== ListingStatus.ACTIVE) {
            throw new ConflictException(`Listing ${listingId} is not active`);
          }
          if (listing.endsAt && Date.now() >= listing.endsAt.getTime()) {
            throw new ConflictException(`Listing ${listingId} has ended`);
          }
          if (listing.sellerId === actor.id) {
            throw new ForbiddenException('Sellers cannot bid on their own listing');
          }

          const counted = await this.listingModel
            .findOneAndUpdate(
              { _id: listingId, status: ListingStatus.ACTIVE, bidCount: { $lt: this.maxBids } },
              { $inc: { bidCount: 1 } },
              { new: true, session: tx },
            )
            .exec();
          if (!counted) {
            throw new ConflictException(
              `Listing ${listingId} reached the limit of ${this.maxBids} bids`,
            );
          }

          const [bid] = await this.listingBidModel.create(
            [
              {
                listingId,
                bidderId: actor.id,
                amount,
                sequence: counted.bidCount - 1,
                status: ListingBidStatus.ACTIVE,
              },
            ],
            { session: tx },
          );

          await this.balanceService.lockFunds(
            actor.id,
            amount,
            bid._id.toString(),
            `Escrow for listing ${listingId}`,
            tx,
          );

          this.logger.log(`Bid ${amount} on listing ${listingId} by ${actor.id}`);
          return bid;
        });
      } catch (error) {
        rethrowAsHttp(this.logger, error, `placing bid on listing ${listingId}`);
      }
    });
  }

  /**
   * Seller or operator at any time, anyone once the listing has ended.
   * Sells the unit to the best bid at or above the reserve if the seller can
   * still deliver it; otherwise every bid is refunded.
   */
  async execute(actor: Actor, listingId: string): Promise<ListingDocument> {
    return this.redisLockService.withLock(`listing:${listingId}`, async () => {
      try {
        return await runInTransaction(this.connection, undefined, async (tx) => {
          const listing = await this.findListing(listingId, tx);
          this.authorizeExecution(actor, listing);

          const bids = (await this.findActiveBids(listingId, tx)).map(toListingBidInput);
          const best = selectWinningBid(bids, listing.reservePrice);
          const winner = best && (await this.canDeliver(listing, tx)) ? best : null;

          const completed = await this.complete(
            listing,
            winner ? ListingOutcome.SUCCESSFUL : ListingOutcome.UNSUCCESSFUL,
            winner,
            tx,
          );

          if (winner) {
            await this.deliverUnit(listing, winner.bidderId, tx);
          } else if (best) {
            this.logger.warn(
              `Listing ${listingId}: seller ${listing.sellerId} can no longer deliver, refunding all bids`,
            );
          }

          await this.settlementService.settleListing(
            { listingId, sellerId: listing.sellerId },
            bids,
            winner,
            tx,
          );

          this.logger.log(
            `Listing ${listingId} executed by ${actor.id}: ${completed.outcome ?? 'unknown'}`,
          );
          return completed;
        });
      } catch (error) {
        rethrowAsHttp(this.logger, error, `executing listing ${listingId}`);
      }
    });
  }

  async cancelListing(actor: Actor, listingId: string): Promise<ListingDocument> {
    return this.redisLockService.withLock(`listing:${listingId}`, async () => {
      try {
        return await runInTransaction(this.connection, undefined, async (tx) => {
          const listing = await this.findListing(listingId, tx);
          assertCreatorOrOperator(actor, listing.sellerId, 'cancel this listing');
          if (listing.status !== ListingStatus.ACTIVE) {
            throw new ConflictException(`Listing ${listingId} is not active`);
          }

          const bids = (await this.findActiveBids(listingId, tx)).map(toListingBidInput);
          const completed = await this.complete(listing, ListingOutcome.CANCELLED, null, tx);

          await this.settlementService.settleListing(
            { listingId, sellerId: listing.sellerId },
            bids,
            null,
            tx,
          );

          this.logger.log(`Listing ${listingId} cancelled by ${actor.id}, ${bids.length} bids refunded`);
          return completed;
        });
      } catch (error) {
        rethrowAsHttp(this.logger, error, `cancelling listing ${listingId}`);
      }
    });
  }

  async getListing(listingId: string): Promise<ListingDocument> {
    return this.findListing(listingId);
  }

  async listListings(filter: ListingFilter = {}, limit = 50): Promise<ListingDocument[]> {
    const query: ListingFilter = {};
    if (filter.status) query.status = filter.status;
    if (filter.kind) query.kind = filter.kind;
    if (filter.assetId) query.assetId = filter.assetId;
    if (filter.sellerId) query.sellerId = filter.sellerId;

    return this.listingModel.find(query).sort({ createdAt: -1 }).limit(limit).exec();
  }

  async getListingBids(listingId: string): Promise<ListingBidDocument[]> {
    await this.findListing(listingId);
    return this.listingBidModel.find({ listingId }).sort({ sequence: 1 }).exec();
  }

  async findExpiredActiveListingIds(now: Date, limit: number): Promise<string[]> {
    const listings = await this.listingModel
      .find({ status: ListingStatus.ACTIVE, endsAt: { $lte: now } })
      .sort({ endsAt: 1 })
      .limit(limit)
      .select('_id')
      .exec();
    return listings.map((listing) => listing._id.toString());
  }

  private async findListing(listingId: string, session?: ClientSession): Promise<ListingDocument> {
    const listing = await this.listingModel
      .findById(listingId)
      .session(session ?? null)
      .exec();
    if (!listing) {
      throw new NotFoundException(`Listing with ID ${listingId} not found`);
    }
    return listing;
  }

  private async findActiveBids(
    listingId: string,
    session: ClientSession,
  ): Promise<ListingBidDocument[]> {
    return this.listingBidModel
      .find({ listingId, status: ListingBidStatus.ACTIVE })
      .sort({ sequence: 1 })
      .session(session)
      .exec();
  }

  private authorizeExecution(actor: Actor, listing: ListingDocument): void {
    const id = listing._id.toString();
    if (listing.status !== ListingStatus.ACTIVE) {
      throw new ConflictException(`Listing ${id} is not active`);
    }
    if (listing.sellerId === actor.id || isOperator(actor)) {
      return;
    }
    if (!listing.endsAt) {
      throw new ForbiddenException('Only the seller or an operator can execute this listing');
    }
    if (Date.now() < listing.endsAt.getTime()) {
      throw new ConflictException(`Listing ${id} runs until ${listing.endsAt.toISOString()}`);
    }
  }

  private async complete(
    listing: ListingDocument,
    outcome: ListingOutcome,
    winner: ListingBidInput | null,
    session: ClientSession,
  ): Promise<ListingDocument> {
    const completed = await this.listingModel
      .findOneAndUpdate(
        { _id: listing._id, status: ListingStatus.ACTIVE },
        {
          $set: {
            status: ListingStatus.COMPLETED,
            outcome,
            completedAt: new Date(),
            ...(winner
              ? { winningBidId: winner.id, winnerId: winner.bidderId, salePrice: winner.amount }
              : {}),
          },
        },
        { new: true, session },
      )
      .exec();

    if (!completed) {
      throw new ConflictException(`Listing ${listing._id.toString()} is not active`);
    }
    return completed;
  }

  private async assertLedgerListable(
    actor: Actor,
    assetId: string,
    session: ClientSession,
  ): Promise<void> {
    const asset = await this.assetModel.findById(assetId).session(session).exec();
    if (!asset) {
      throw new NotFoundException(`Asset with ID ${assetId} not found`);
    }
    if (asset.status !== AssetStatus.CLOSED) {
      throw new ConflictException('Shares can be listed only after the offering closes');
    }

    const free = await this.holdingsService.freeUnitsOf(assetId, actor.id, session);
    if (free < 1) {
      throw new BadRequestException(`No unlisted units of asset ${assetId} to sell`);
    }
  }

  private async assertTokenListable(
    actor: Actor,
    tokenId: number,
    session: ClientSession,
  ): Promise<void> {
    const owner = await this.tokenRegistry.ownerOf(tokenId, session);
    if (owner !== actor.id) {
      throw new ForbiddenException(`Token ${tokenId} is not owned by you`);
    }
    if (!(await this.isMarketplaceApproved(actor.id, tokenId, session))) {
      throw new BadRequestException(
        `Approve operator "${MARKETPLACE_OPERATOR}" for token ${tokenId} before listing it`,
      );
    }

    const active = await this.listingModel
      .countDocuments({ kind: ListingKind.TOKEN, tokenId, status: ListingStatus.ACTIVE })
      .session(session)
      .exec();
    if (active > 0) {
      throw new ConflictException(`Token ${tokenId} is already listed`);
    }
  }

  private async isMarketplaceApproved(
    ownerId: string,
    tokenId: number,
    session: ClientSession,
  ): Promise<boolean> {
    const approved = await this.tokenRegistry.getApproved(tokenId, session);
    return (
      approved === MARKETPLACE_OPERATOR ||
      (await this.tokenRegistry.isApprovedForAll(ownerId, MARKETPLACE_OPERATOR, session))
    );
  }

  private async canDeliver(listing: ListingDocument, session: ClientSession): Promise<boolean> {
    if (listing.kind === ListingKind.LEDGER) {
      if (!listing.assetId) {
        return false;
      }
      return (await this.holdingsService.balanceOf(listing.assetId, listing.sellerId, session)) >= 1;
    }

    if (listing.tokenId === undefined || listing.tokenId === null) {
      return false;
    }
    const owner = await this.tokenRegistry.ownerOf(listing.tokenId, session);
    return (
      owner === listing.sellerId &&
      (await this.isMarketplaceApproved(listing.sellerId, listing.tokenId, session))
    );
  }

  private async deliverUnit(
    listing: ListingDocument,
    buyerId: string,
    session: ClientSession,
  ): Promise<void> {
    if (listing.kind === ListingKind.LEDGER && listing.assetId) {
      await this.holdingsService.transferUnits(listing.assetId, listing.sellerId, buyerId, 1, session);
      return;
    }
    if (listing.kind === ListingKind.TOKEN && listing.tokenId !== undefined && listing.tokenId !== null) {
      await this.tokenRegistry.safeTransferFrom(
        MARKETPLACE_OPERATOR,
        listing.sellerId,
        buyerId,
        listing.tokenId,
        session,
      );
      return;
    }
    throw new InternalServerErrorException(
      `Listing ${listing._id.toString()} references no deliverable unit`,
    );
  }
}
