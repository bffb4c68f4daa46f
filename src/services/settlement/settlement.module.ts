import { Module } from '@nestjs/common';
import { ModelsModule } from '../../models/models.module';
import { BalanceModule } from '../balance/balance.module';
import { HoldingsModule } from '../holdings/holdings.module';
import { SettlementService } from './settlement.service';

@Module({
  imports: [ModelsModule, BalanceModule, HoldingsModule],
  providers: [SettlementService],
  exports: [SettlementService],
})
export class SettlementModule {}
