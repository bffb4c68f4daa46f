import {
  BadRequestException,
  ConflictException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { ClientSession, Connection, Model } from 'mongoose';
import { Asset, AssetDocument } from '../../models/asset.schema';
import { OfferingBid, OfferingBidDocument } from '../../models/offering-bid.schema';
import { AssetStatus } from '../../common/enums/asset-status.enum';
import { OfferingBidStatus } from '../../common/enums/offering-bid-status.enum';
import { Actor } from '../../common/auth/actor';
import { assertAmount } from '../../common/utils/money';
import { isTransientTransactionError, rethrowAsHttp } from '../../common/utils/transaction';
import { BalanceService } from '../balance/balance.service';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import {
  OfferingBidInput,
  impliedUnitPrice,
  rankBids,
} from '../allocation/allocation-engine';

export function toOfferingBidInput(bid: OfferingBidDocument): OfferingBidInput {
  return {
    id: bid._id.toString(),
    bidderId: bid.bidderId,
    quantity: bid.quantity,
    deposit: bid.deposit,
    unitPrice: bid.unitPrice,
    sequence: bid.sequence,
    status: bid.status,
  };
}

/**
 * BidBookService
 *
 * Sealed bids on a primary offering. Each bid escrows its whole deposit;
 * bids from the same bidder never merge. Submission order (sequence) is
 * assigned from the asset's bid counter, which also bounds the book.
 *
 * Submission runs under the `asset:` lock, which serializes writers in this
 * process and, with Redis enabled, across instances. The transient-error
 * retry only matters when Redis is disabled: the lock is then per process,
 * and a second instance can still hit the same asset and bidder documents.
 */
@Injectable()
export class BidBookService {
  private readonly logger = new Logger(BidBookService.name);
  private readonly maxBids: number;

  private static readonly MAX_RETRIES = 3;
  private static readonly RETRY_DELAY_MS = 100;

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(Asset.name) private assetModel: Model<AssetDocument>,
    @InjectModel(OfferingBid.name) private bidModel: Model<OfferingBidDocument>,
    private balanceService: BalanceService,
    private redisLockService: RedisLockService,
    private configService: ConfigService,
  ) {
    this.maxBids = this.configService.get<number>('auction.maxBidsPerSubject', 500);
  }

  /**
   * Submit a sealed bid for `quantity` shares backed by `deposit`.
   * All checks and writes happen in one transaction under the asset lock;
   * nothing changes when a check fails.
   */
  async submitBid(
    actor: Actor,
    assetId: string,
    quantity: number,
    deposit: number,
  ): Promise<OfferingBidDocument> {
    assertAmount(quantity, 'Quantity');
    assertAmount(deposit, 'Deposit');

    const unitPrice = impliedUnitPrice(deposit, quantity);
    if (unitPrice < 1) {
      throw new BadRequestException(
        `Deposit ${deposit} is too small for ${quantity} units: implied unit price must be at least 1`,
      );
    }

    return this.redisLockService.withLock(`asset:${assetId}`, () =>
      this.executeSubmitTransaction(actor.id, assetId, quantity, deposit, unitPrice),
    );
  }

  async getBidsForAsset(assetId: string): Promise<OfferingBidDocument[]> {
    return this.bidModel.find({ assetId }).sort({ sequence: 1 }).exec();
  }

  async getPendingBids(assetId: string, session?: ClientSession): Promise<OfferingBidDocument[]> {
    return this.bidModel
      .find({ assetId, status: OfferingBidStatus.PENDING })
      .sort({ sequence: 1 })
      .session(session ?? null)
      .exec();
  }

  /**
   * Bids in allocation order: unit price descending, then submission order
   */
  async getRankedBids(assetId: string): Promise<OfferingBidDocument[]> {
    return rankBids(await this.getBidsForAsset(assetId));
  }

  async getBidsOfBidder(bidderId: string): Promise<OfferingBidDocument[]> {
    return this.bidModel.find({ bidderId }).sort({ createdAt: -1 }).exec();
  }

  private async executeSubmitTransaction(
    bidderId: string,
    assetId: string,
    quantity: number,
    deposit: number,
    unitPrice: number,
  ): Promise<OfferingBidDocument> {
    const maxRetries = BidBookService.MAX_RETRIES;
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const session = await this.connection.startSession();

      try {
        const created: OfferingBidDocument[] = [];

        await session.withTransaction(async () => {
          created.length = 0;

          const asset = await this.assetModel.findById(assetId).session(session).exec();
          if (!asset) {
            throw new NotFoundException(`Asset with ID ${assetId} not found`);
          }
          if (asset.status !== AssetStatus.OPEN) {
            throw new ConflictException(`Offering ${assetId} is closed`);
          }
          if (asset.biddingEndsAt && Date.now() >= asset.biddingEndsAt.getTime()) {
            throw new ConflictException(`Bidding on offering ${assetId} has ended`);
          }

          // счетчик ставок: дает sequence и ограничивает размер книги
          const counted = await this.assetModel
            .findOneAndUpdate(
              { _id: assetId, status: AssetStatus.OPEN, bidCount: { $lt: this.maxBids } },
              { $inc: { bidCount: 1 } },
              { new: true, session },
            )
            .exec();
          if (!counted) {
            throw new ConflictException(
              `Offering ${assetId} reached the limit of ${this.maxBids} bids`,
            );
          }

          const [bid] = await this.bidModel.create(
            [
              {
                assetId,
                bidderId,
                quantity,
                deposit,
                unitPrice,
                sequence: counted.bidCount - 1,
                status: OfferingBidStatus.PENDING,
              },
            ],
            { session },
          );

          if (!bid) {
            throw new InternalServerErrorException('Failed to create bid');
          }

          await this.balanceService.lockFunds(
            bidderId,
            deposit,
            bid._id.toString(),
            `Escrow for ${quantity} units of asset ${assetId}`,
            session,
          );

          created.push(bid);
        });

        await session.endSession();

        if (created.length === 0) {
          throw new InternalServerErrorException('Bid submission finished without a bid');
        }

        this.logger.log(
          `Bid ${created[0]._id.toString()} on asset ${assetId}: ${quantity} units @ ${unitPrice} (deposit ${deposit}) by ${bidderId}`,
        );
        return created[0];
      } catch (error) {
        await session.endSession();
        lastError = error instanceof Error ? error : new Error(String(error));

        // бизнес-ошибки и не транзиентные ошибки не ретраим
        if (!isTransientTransactionError(error)) {
          rethrowAsHttp(this.logger, error, `submitting bid on asset ${assetId}`);
        }

        if (attempt >= maxRetries) {
          this.logger.error(
            `Failed to submit bid after ${maxRetries} attempts for ${bidderId} on asset ${assetId}:`,
            lastError,
          );
          throw new InternalServerErrorException(
            `Failed to submit bid after ${maxRetries} retries: ${lastError.message}`,
          );
        }

        this.logger.warn(
          `Retry ${attempt}/${maxRetries} for bid submission (bidder ${bidderId}, asset ${assetId}): ${lastError.message}`,
        );
        await new Promise((resolve) =>
          setTimeout(resolve, BidBookService.RETRY_DELAY_MS * attempt),
        );
      }
    }

    throw new InternalServerErrorException(
      `Failed to submit bid: ${lastError?.message || 'Unknown error occurred'}`,
    );
  }
}
