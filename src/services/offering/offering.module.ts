import { Module } from '@nestjs/common';
import { ModelsModule } from '../../models/models.module';
import { BidBookModule } from '../bid-book/bid-book.module';
import { HoldingsModule } from '../holdings/holdings.module';
import { SettlementModule } from '../settlement/settlement.module';
import { OfferingService } from './offering.service';

@Module({
  imports: [ModelsModule, BidBookModule, HoldingsModule, SettlementModule],
  providers: [OfferingService],
  exports: [OfferingService],
})
export class OfferingModule {}
