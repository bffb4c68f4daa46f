import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { ListingBidStatus } from '../common/enums/listing.enum';

export type ListingBidDocument = HydratedDocument<ListingBid>;

/**
 * ListingBid model
 *
 * A plain (bidder, amount) bid on a single-unit listing; the amount is
 * escrowed in full from the bidder when the bid is placed.
 */
@Schema({
  timestamps: true,
  collection: 'listing_bids',
})
export class ListingBid {
  @Prop({ required: true, type: String })
  listingId!: string;

  @Prop({ required: true, type: String })
  bidderId!: string;

  @Prop({ required: true, min: 1 })
  amount!: number;

  /**
   * Placement order within the listing (0-based); earliest wins ties
   */
  @Prop({ required: true, min: 0 })
  sequence!: number;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(ListingBidStatus),
    default: ListingBidStatus.ACTIVE,
  })
  status!: ListingBidStatus;

  createdAt!: Date;

  updatedAt!: Date;
}

export const ListingBidSchema = SchemaFactory.createForClass(ListingBid);

ListingBidSchema.index({ listingId: 1, sequence: 1 }, { unique: true });
ListingBidSchema.index({ bidderId: 1, status: 1 });
