import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { ClientSession, Connection, Model } from 'mongoose';
import { Token, TokenDocument } from '../../models/token.schema';
import {
  OperatorApproval,
  OperatorApprovalDocument,
} from '../../models/operator-approval.schema';
import { Actor } from '../../common/auth/actor';
import { rethrowAsHttp, runInTransaction } from '../../common/utils/transaction';
import { RedisLockService } from '../redis-lock/redis-lock.service';
import { TokenRegistry } from './token-registry.interface';

/**
 * TokenRegistryService
 *
 * Mongo-backed token registry: sequential token ids, single-token approvals
 * (cleared on transfer) and blanket operator approvals per owner.
 */
@Injectable()
export class TokenRegistryService implements TokenRegistry {
  private readonly logger = new Logger(TokenRegistryService.name);

  constructor(
    @InjectConnection() private connection: Connection,
    @InjectModel(Token.name) private tokenModel: Model<TokenDocument>,
    @InjectModel(OperatorApproval.name)
    private approvalModel: Model<OperatorApprovalDocument>,
    private redisLockService: RedisLockService,
  ) {}

  async mint(toId: string, name: string, uri?: string): Promise<TokenDocument> {
    // последовательные id, выдача под общим локом
    return this.redisLockService.withLock(
      'token:mint',
      async () => {
        try {
          return await runInTransaction(this.connection, undefined, async (tx) => {
            const last = await this.tokenModel
              .findOne()
              .sort({ tokenId: -1 })
              .session(tx)
              .exec();
            const tokenId = last ? last.tokenId + 1 : 1;

            const [token] = await this.tokenModel.create(
              [{ tokenId, ownerId: toId, name, uri }],
              { session: tx },
            );

            this.logger.log(`Minted token ${tokenId} to ${toId}`);
            return token;
          });
        } catch (error) {
          rethrowAsHttp(this.logger, error, 'minting token');
        }
      },
      undefined,
      { maxRetries: 5, retryDelayMs: 20 },
    );
  }

  async getToken(tokenId: number, session?: ClientSession): Promise<TokenDocument> {
    const token = await this.tokenModel
      .findOne({ tokenId })
      .session(session ?? null)
      .exec();
    if (!token) {
      throw new NotFoundException(`Token ${tokenId} not found`);
    }
    return token;
  }

  async ownerOf(tokenId: number, session?: ClientSession): Promise<string> {
    return (await this.getToken(tokenId, session)).ownerId;
  }

  async getApproved(tokenId: number, session?: ClientSession): Promise<string | null> {
    return (await this.getToken(tokenId, session)).approved ?? null;
  }

  async isApprovedForAll(
    ownerId: string,
    operator: string,
    session?: ClientSession,
  ): Promise<boolean> {
    const approval = await this.approvalModel
      .findOne({ ownerId, operator })
      .session(session ?? null)
      .exec();
    return approval ? approval.approved : false;
  }

  async totalSupply(): Promise<number> {
    return this.tokenModel.countDocuments().exec();
  }

  /**
   * Sets (or with null clears) the single approved operator of a token.
   * Owner or an operator approved for all of the owner's tokens.
   */
  async approve(actor: Actor, tokenId: number, operator: string | null): Promise<TokenDocument> {
    return this.redisLockService.withLock(`token:${tokenId}`, async () => {
      try {
        return await runInTransaction(this.connection, undefined, async (tx) => {
          const token = await this.getToken(tokenId, tx);
          if (
            token.ownerId !== actor.id &&
            !(await this.isApprovedForAll(token.ownerId, actor.id, tx))
          ) {
            throw new ForbiddenException(
              `Only the owner can approve operators for token ${tokenId}`,
            );
          }
          if (operator === token.ownerId) {
            throw new BadRequestException('Owner cannot be approved for its own token');
          }

          const updated = await this.tokenModel
            .findOneAndUpdate(
              { tokenId, ownerId: token.ownerId },
              operator ? { $set: { approved: operator } } : { $unset: { approved: 1 } },
              { new: true, session: tx },
            )
            .exec();
          if (!updated) {
            throw new ConflictException(`Token ${tokenId} changed owner, try again`);
          }

          this.logger.log(`Token ${tokenId}: approved operator ${operator ?? 'cleared'}`);
          return updated;
        });
      } catch (error) {
        rethrowAsHttp(this.logger, error, `approving operator for token ${tokenId}`);
      }
    });
  }

  /**
   * Blanket approval over all of the caller's tokens, serialized per owner
   */
  async setApprovalForAll(actor: Actor, operator: string, approved: boolean): Promise<void> {
    if (operator === actor.id) {
      throw new BadRequestException('Cannot approve yourself as operator');
    }

    await this.redisLockService.withLock(`approvals:${actor.id}`, async () => {
      try {
        await runInTransaction(this.connection, undefined, async (tx) => {
          await this.approvalModel
            .updateOne(
              { ownerId: actor.id, operator },
              { $set: { approved } },
              { upsert: true, session: tx },
            )
            .exec();
        });
      } catch (error) {
        rethrowAsHttp(this.logger, error, `setting operator approval for ${actor.id}`);
      }
    });

    this.logger.log(`Owner ${actor.id}: operator ${operator} approved for all = ${approved}`);
  }

  async safeTransferFrom(
    operator: string,
    fromId: string,
    toId: string,
    tokenId: number,
    session?: ClientSession,
  ): Promise<void> {
    if (!toId) {
      throw new BadRequestException('Transfer recipient is required');
    }

    await runInTransaction(this.connection, session, async (tx) => {
      const token = await this.getToken(tokenId, tx);
      if (token.ownerId !== fromId) {
        throw new BadRequestException(`Token ${tokenId} is not owned by ${fromId}`);
      }

      const authorized =
        operator === fromId ||
        token.approved === operator ||
        (await this.isApprovedForAll(fromId, operator, tx));
      if (!authorized) {
        throw new ForbiddenException(`${operator} is not approved to move token ${tokenId}`);
      }

      // approval is per owner: cleared together with the transfer
      const moved = await this.tokenModel
        .findOneAndUpdate(
          { tokenId, ownerId: fromId },
          { $set: { ownerId: toId }, $unset: { approved: 1 } },
          { new: true, session: tx },
        )
        .exec();
      if (!moved) {
        throw new ConflictException(`Token ${tokenId} changed owner during transfer`);
      }
    });

    this.logger.log(`Token ${tokenId} transferred ${fromId} -> ${toId} by ${operator}`);
  }

  /**
   * Owner-initiated transfer
   */
  async transfer(actor: Actor, tokenId: number, toId: string): Promise<TokenDocument> {
    return this.redisLockService.withLock(`token:${tokenId}`, async () => {
      try {
        await this.safeTransferFrom(actor.id, actor.id, toId, tokenId);
        return await this.getToken(tokenId);
      } catch (error) {
        rethrowAsHttp(this.logger, error, `transferring token ${tokenId}`);
      }
    });
  }
}
