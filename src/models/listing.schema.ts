import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import {
  ListingKind,
  ListingOutcome,
  ListingStatus,
} from '../common/enums/listing.enum';

export type ListingDocument = HydratedDocument<Listing>;

/**
 * Listing model: single-unit resale auction
 *
 * LEDGER listings sell one share of an issued asset (assetId),
 * TOKEN listings sell one registry token (tokenId).
 *
 * State machine: ACTIVE -> COMPLETED
 *
 * Invariants:
 * - exactly one of assetId / tokenId is set, matching kind
 * - COMPLETED implies outcome and completedAt are set
 * - outcome SUCCESSFUL implies winningBidId, winnerId and salePrice are set
 */
@Schema({
  timestamps: true,
  collection: 'listings',
})
export class Listing {
  @Prop({ required: true, type: String, enum: Object.values(ListingKind) })
  kind!: ListingKind;

  @Prop({ type: String })
  assetId?: string;

  @Prop()
  tokenId?: number;

  @Prop({ required: true, type: String, index: true })
  sellerId!: string;

  /**
   * Minimum price for the single unit
   */
  @Prop({ required: true, min: 0 })
  reservePrice!: number;

  @Prop({ type: Date })
  endsAt?: Date;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(ListingStatus),
    default: ListingStatus.ACTIVE,
  })
  status!: ListingStatus;

  @Prop({ type: String, enum: Object.values(ListingOutcome) })
  outcome?: ListingOutcome;

  @Prop({ required: true, default: 0, min: 0 })
  bidCount!: number;

  @Prop({ type: String })
  winningBidId?: string;

  @Prop({ type: String })
  winnerId?: string;

  @Prop({ min: 0 })
  salePrice?: number;

  @Prop()
  completedAt?: Date;

  createdAt!: Date;

  updatedAt!: Date;
}

export const ListingSchema = SchemaFactory.createForClass(Listing);

ListingSchema.index({ status: 1, endsAt: 1 }); // For keeper queries
ListingSchema.index({ kind: 1, assetId: 1, sellerId: 1, status: 1 }); // Listed shares per seller
ListingSchema.index({ kind: 1, tokenId: 1, status: 1 });

ListingSchema.pre('save', function (next) {
  const hasAsset = this.assetId !== undefined && this.assetId !== null;
  const hasToken = this.tokenId !== undefined && this.tokenId !== null;
  if (this.kind === ListingKind.LEDGER && (!hasAsset || hasToken)) {
    next(new Error('LEDGER listing must reference an asset and no token'));
  } else if (this.kind === ListingKind.TOKEN && (!hasToken || hasAsset)) {
    next(new Error('TOKEN listing must reference a token and no asset'));
  } else {
    next();
  }
});
