import { Module } from '@nestjs/common';
import { ModelsModule } from '../../models/models.module';
import { BalanceModule } from '../balance/balance.module';
import { HoldingsModule } from '../holdings/holdings.module';
import { SettlementModule } from '../settlement/settlement.module';
import { TokenRegistryModule } from '../token-registry/token-registry.module';
import { MarketService } from './market.service';

@Module({
  imports: [ModelsModule, BalanceModule, HoldingsModule, SettlementModule, TokenRegistryModule],
  providers: [MarketService],
  exports: [MarketService],
})
export class MarketModule {}
