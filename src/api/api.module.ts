import { Module } from '@nestjs/common';
import { UsersController } from '../controllers/users/users.controller';
import { AssetsController } from '../controllers/assets/assets.controller';
import { ListingsController } from '../controllers/listings/listings.controller';
import { TokensController } from '../controllers/tokens/tokens.controller';
import { BalanceModule } from '../services/balance/balance.module';
import { HoldingsModule } from '../services/holdings/holdings.module';
import { BidBookModule } from '../services/bid-book/bid-book.module';
import { OfferingModule } from '../services/offering/offering.module';
import { MarketModule } from '../services/market/market.module';
import { TokenRegistryModule } from '../services/token-registry/token-registry.module';

/**
 * ApiModule
 *
 * REST controllers over the service modules
 */
@Module({
  imports: [
    BalanceModule,
    HoldingsModule,
    BidBookModule,
    OfferingModule,
    MarketModule,
    TokenRegistryModule,
  ],
  controllers: [UsersController, AssetsController, ListingsController, TokensController],
})
export class ApiModule {}
