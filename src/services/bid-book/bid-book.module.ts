import { Module } from '@nestjs/common';
import { ModelsModule } from '../../models/models.module';
import { BalanceModule } from '../balance/balance.module';
import { BidBookService } from './bid-book.service';

@Module({
  imports: [ModelsModule, BalanceModule],
  providers: [BidBookService],
  exports: [BidBookService],
})
export class BidBookModule {}
