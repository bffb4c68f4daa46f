import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import {
  User,
  UserSchema,
  LedgerEntry,
  LedgerEntrySchema,
  Asset,
  AssetSchema,
  OfferingBid,
  OfferingBidSchema,
  Holding,
  HoldingSchema,
  Listing,
  ListingSchema,
  ListingBid,
  ListingBidSchema,
  Token,
  TokenSchema,
  OperatorApproval,
  OperatorApprovalSchema,
} from './index';

/**
 * Models module
 * Registers all Mongoose schemas
 * This module is imported globally in AppModule
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: User.name, schema: UserSchema },
      { name: LedgerEntry.name, schema: LedgerEntrySchema },
      { name: Asset.name, schema: AssetSchema },
      { name: OfferingBid.name, schema: OfferingBidSchema },
      { name: Holding.name, schema: HoldingSchema },
      { name: Listing.name, schema: ListingSchema },
      { name: ListingBid.name, schema: ListingBidSchema },
      { name: Token.name, schema: TokenSchema },
      { name: OperatorApproval.name, schema: OperatorApprovalSchema },
    ]),
  ],
  exports: [MongooseModule],
})
export class ModelsModule {}
