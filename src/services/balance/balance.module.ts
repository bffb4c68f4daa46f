import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { BalanceService } from './balance.service';
import { LoggingPayoutGateway, PAYOUT_GATEWAY } from './payout-gateway';
import { User, UserSchema } from '../../models/user.schema';
import {
  LedgerEntry,
  LedgerEntrySchema,
} from '../../models/ledger-entry.schema';

/**
 * BalanceModule
 *
 * Provides BalanceService for all balance and escrow operations.
 * Override PAYOUT_GATEWAY to plug a real payment provider into withdrawals.
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: User.name, schema: UserSchema },
      { name: LedgerEntry.name, schema: LedgerEntrySchema },
    ]),
  ],
  providers: [
    BalanceService,
    { provide: PAYOUT_GATEWAY, useClass: LoggingPayoutGateway },
  ],
  exports: [BalanceService],
})
export class BalanceModule {}
