import { Module } from '@nestjs/common';
import { OfferingModule } from '../offering/offering.module';
import { MarketModule } from '../market/market.module';
import { SettlementKeeperService } from './settlement-keeper.service';

/**
 * Background settlement of expired offerings and listings.
 * Cron jobs need ScheduleModule.forRoot() in the root module.
 */
@Module({
  imports: [OfferingModule, MarketModule],
  providers: [SettlementKeeperService],
  exports: [SettlementKeeperService],
})
export class KeeperModule {}
