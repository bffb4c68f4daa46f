import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { ClientSession, Connection, Model } from 'mongoose';
import { Holding, HoldingDocument } from '../../models/holding.schema';
import { Asset, AssetDocument } from '../../models/asset.schema';
import { Listing, ListingDocument } from '../../models/listing.schema';
import { User, UserDocument } from '../../models/user.schema';
import { AssetStatus } from '../../common/enums/asset-status.enum';
import { ListingKind, ListingStatus } from '../../common/enums/listing.enum';
import { Actor } from '../../common/auth/actor';
import { rethrowAsHttp, runInTransaction } from '../../common/utils/transaction';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import { HolderAllocation } from '../allocation/allocation-engine';

/**
 * HoldingsService
 *
 * The share ledger: (asset, holder) -> whole units. Single source of truth
 * for ownership of issued assets; the secondary market moves shares only
 * through transferUnits.
 *
 * Entries never hold zero units: they are deleted when emptied and created
 * on first credit. Holder enumeration order is not guaranteed.
 */
@Injectable()
export class HoldingsService {
  private readonly logger = new Logger(HoldingsService.name);

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(Holding.name) private holdingModel: Model<HoldingDocument>,
    @InjectModel(Asset.name) private assetModel: Model<AssetDocument>,
    @InjectModel(Listing.name) private listingModel: Model<ListingDocument>,
    @InjectModel(User.name) private userModel: Model<UserDocument>,
    private redisLockService: RedisLockService,
  ) {}

  async issue(
    assetId: string,
    holderId: string,
    units: number,
    session?: ClientSession,
  ): Promise<void> {
    if (!Number.isSafeInteger(units) || units < 1) {
      throw new BadRequestException('Units must be a positive integer');
    }

    await this.holdingModel
      .updateOne(
        { assetId, holderId },
        { $inc: { units } },
        { upsert: true, session },
      )
      .exec();
  }

  /**
   * Moves `count` units of `assetId` from one holder to another.
   * `from` must hold at least `count`; its entry is deleted at zero.
   */
  async transferUnits(
    assetId: string,
    fromHolderId: string,
    toHolderId: string,
    count: number,
    session?: ClientSession,
  ): Promise<void> {
    if (!Number.isSafeInteger(count) || count < 1) {
      throw new BadRequestException('Transfer count must be a positive integer');
    }
    if (fromHolderId === toHolderId) {
      throw new BadRequestException('Cannot transfer units to the same holder');
    }

    await runInTransaction(this.connection, session, async (tx) => {
      const debited = await this.holdingModel
        .findOneAndUpdate(
          { assetId, holderId: fromHolderId, units: { $gte: count } },
          { $inc: { units: -count } },
          { new: true, session: tx },
        )
        .exec();

      if (!debited) {
        throw new BadRequestException(
          `Holder ${fromHolderId} does not hold ${count} units of asset ${assetId}`,
        );
      }

      if (debited.units === 0) {
        await this.holdingModel.deleteOne({ _id: debited._id }, { session: tx }).exec();
      }

      await this.issue(assetId, toHolderId, count, tx);
    });

    this.logger.log(
      `Transferred ${count} units of asset ${assetId}: ${fromHolderId} -> ${toHolderId}`,
    );
  }

  /**
   * Replaces the asset's cap table wholesale
   */
  async replaceCapTable(
    assetId: string,
    allocations: readonly HolderAllocation[],
    session?: ClientSession,
  ): Promise<void> {
    await runInTransaction(this.connection, session, async (tx) => {
      await this.holdingModel.deleteMany({ assetId }, { session: tx }).exec();

      const entries = allocations
        .filter((allocation) => allocation.units > 0)
        .map((allocation) => ({
          assetId,
          holderId: allocation.holderId,
          units: allocation.units,
        }));

      if (entries.length > 0) {
        await this.holdingModel.insertMany(entries, { session: tx });
      }
    });
  }

  async balanceOf(
    assetId: string,
    holderId: string,
    session?: ClientSession,
  ): Promise<number> {
    const holding = await this.holdingModel
      .findOne({ assetId, holderId })
      .session(session ?? null)
      .exec();
    return holding ? holding.units : 0;
  }

  async getHolders(assetId: string): Promise<HoldingDocument[]> {
    return this.holdingModel.find({ assetId }).sort({ units: -1 }).exec();
  }

  async getHoldingsOf(holderId: string): Promise<HoldingDocument[]> {
    return this.holdingModel.find({ holderId }).exec();
  }

  /**
   * Units a holder can still commit: holding minus units pledged to the
   * holder's active LEDGER listings of the asset
   */
  async freeUnitsOf(
    assetId: string,
    holderId: string,
    session?: ClientSession,
  ): Promise<number> {
    // одна сессия не допускает параллельных операций
    const units = await this.balanceOf(assetId, holderId, session);
    const listed = await this.listingModel
      .countDocuments({
        kind: ListingKind.LEDGER,
        assetId,
        sellerId: holderId,
        status: ListingStatus.ACTIVE,
      })
      .session(session ?? null)
      .exec();
    return units - listed;
  }

  /**
   * Peer-to-peer transfer of issued shares, requested by their holder
   */
  async transferIssued(
    actor: Actor,
    assetId: string,
    toHolderId: string,
    count: number,
  ): Promise<{ from: number; to: number }> {
    return this.redisLockService.withLock(`asset:${assetId}`, async () => {
      try {
        return await runInTransaction(this.connection, undefined, async (tx) => {
          const asset = await this.assetModel.findById(assetId).session(tx).exec();
          if (!asset) {
            throw new NotFoundException(`Asset with ID ${assetId} not found`);
          }
          if (asset.status !== AssetStatus.CLOSED) {
            throw new ConflictException('Shares can be transferred only after the offering closes');
          }

          const recipient = await this.userModel.findById(toHolderId).session(tx).exec();
          if (!recipient) {
            throw new NotFoundException(`User with ID ${toHolderId} not found`);
          }

          const free = await this.freeUnitsOf(assetId, actor.id, tx);
          if (free < count) {
            throw new BadRequestException(
              `Only ${Math.max(free, 0)} units are free to transfer (the rest are listed or not held)`,
            );
          }

          await this.transferUnits(assetId, actor.id, toHolderId, count, tx);

          return {
            from: await this.balanceOf(assetId, actor.id, tx),
            to: await this.balanceOf(assetId, toHolderId, tx),
          };
        });
      } catch (error) {
        rethrowAsHttp(this.logger, error, `transferring units of asset ${assetId}`);
      }
    });
  }
}
