import { Module } from '@nestjs/common';
import { ModelsModule } from '../../models/models.module';
import { HoldingsService } from './holdings.service';

@Module({
  imports: [ModelsModule],
  providers: [HoldingsService],
  exports: [HoldingsService],
})
export class HoldingsModule {}
