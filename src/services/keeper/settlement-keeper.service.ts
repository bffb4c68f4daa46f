import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { Actor } from '../../common/auth/actor';
import { AccountRole } from '../../common/enums/account-role.enum';
import { OfferingService } from '../offering/offering.service';
import { MarketService } from '../market/market.service';

/**
 * The keeper closes subjects as an ordinary account: deadline closure and
 * post-deadline execution are open to anyone
 */
export const KEEPER_ACTOR: Actor = { id: 'keeper', role: AccountRole.USER };

export interface KeeperRunSummary {
  offeringsClosed: number;
  listingsExecuted: number;
  failed: number;
}

/**
 * SettlementKeeperService
 *
 * Polls MongoDB for open offerings past their bidding deadline and active
 * listings past their end time, and settles them. Restart-safe: state is
 * read from the database on every run; a subject settled by someone else
 * in between fails its status check and is counted as failed.
 */
@Injectable()
export class SettlementKeeperService implements OnModuleInit {
  private readonly logger = new Logger(SettlementKeeperService.name);
  private readonly enabled: boolean;
  private readonly batchSize: number;
  private running = false;

  constructor(
    private offeringService: OfferingService,
    private marketService: MarketService,
    private configService: ConfigService,
  ) {
    this.enabled = this.configService.get<boolean>('keeper.enabled', false);
    this.batchSize = this.configService.get<number>('keeper.batchSize', 20);
  }

  onModuleInit() {
    this.logger.log(
      { action: 'keeper-initialized', enabled: this.enabled, batchSize: this.batchSize },
      'SettlementKeeper initialized',
    );
  }

  @Cron(CronExpression.EVERY_10_SECONDS, { name: 'settle-expired' })
  async settleExpiredJob(): Promise<void> {
    if (!this.enabled || this.running) {
      return;
    }

    this.running = true;
    const startedAt = Date.now();
    try {
      const summary = await this.runOnce(new Date());
      if (summary.offeringsClosed + summary.listingsExecuted + summary.failed > 0) {
        this.logger.log(
          { job: 'settle-expired', ...summary, durationMs: Date.now() - startedAt },
          `Keeper run: ${summary.offeringsClosed} offerings, ${summary.listingsExecuted} listings, ${summary.failed} failed`,
        );
      }
    } catch (error) {
      // следующий запуск повторит
      this.logger.error(
        {
          job: 'settle-expired',
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        'Error in settleExpiredJob',
      );
    } finally {
      this.running = false;
    }
  }

  async runOnce(now: Date): Promise<KeeperRunSummary> {
    const summary: KeeperRunSummary = { offeringsClosed: 0, listingsExecuted: 0, failed: 0 };

    const assetIds = await this.offeringService.findExpiredOpenAssetIds(now, this.batchSize);
    for (const assetId of assetIds) {
      try {
        await this.offeringService.closeAtDeadline(KEEPER_ACTOR, assetId);
        summary.offeringsClosed++;
      } catch (error) {
        summary.failed++;
        this.logFailure('close-offering', { assetId }, error);
      }
    }

    const listingIds = await this.marketService.findExpiredActiveListingIds(now, this.batchSize);
    for (const listingId of listingIds) {
      try {
        await this.marketService.execute(KEEPER_ACTOR, listingId);
        summary.listingsExecuted++;
      } catch (error) {
        summary.failed++;
        this.logFailure('execute-listing', { listingId }, error);
      }
    }

    return summary;
  }

  private logFailure(action: string, subject: Record<string, string>, error: unknown): void {
    this.logger.error(
      {
        job: 'settle-expired',
        action,
        ...subject,
        error: error instanceof Error ? error.message : String(error),
      },
      `Keeper failed to ${action.replace('-', ' ')}`,
    );
  }
}
