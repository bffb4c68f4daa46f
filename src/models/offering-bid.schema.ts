import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { OfferingBidStatus } from '../common/enums/offering-bid-status.enum';

export type OfferingBidDocument = HydratedDocument<OfferingBid>;

/**
 * OfferingBid model
 *
 * A sealed bid for `quantity` shares of an asset, backed by `deposit` escrowed
 * from the bidder. The unit price is implied: floor(deposit / quantity).
 * Bids are NEVER deleted and never merge, even for the same bidder.
 *
 * Settlement fields (written once by the closure pass):
 *   charged + refunded + dust == deposit
 *   charged == allocatedUnits * unitPrice
 */
@Schema({
  timestamps: true,
  collection: 'offering_bids',
})
export class OfferingBid {
  @Prop({ required: true, type: String })
  assetId!: string;

  @Prop({ required: true, type: String })
  bidderId!: string;

  @Prop({ required: true, min: 1 })
  quantity!: number;

  @Prop({ required: true, min: 1 })
  deposit!: number;

  @Prop({ required: true, min: 1 })
  unitPrice!: number;

  /**
   * Submission order within the asset (0-based); breaks unit-price ties
   */
  @Prop({ required: true, min: 0 })
  sequence!: number;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(OfferingBidStatus),
    default: OfferingBidStatus.PENDING,
  })
  status!: OfferingBidStatus;

  @Prop({ default: 0, min: 0 })
  allocatedUnits!: number;

  @Prop({ default: 0, min: 0 })
  charged!: number;

  @Prop({ default: 0, min: 0 })
  refunded!: number;

  @Prop({ default: 0, min: 0 })
  dust!: number;

  @Prop()
  settledAt?: Date;

  createdAt!: Date;

  updatedAt!: Date;
}

export const OfferingBidSchema = SchemaFactory.createForClass(OfferingBid);

OfferingBidSchema.index({ assetId: 1, sequence: 1 }, { unique: true });
OfferingBidSchema.index({ bidderId: 1, createdAt: -1 });

OfferingBidSchema.pre('save', function (next) {
  if (this.unitPrice !== Math.floor(this.deposit / this.quantity)) {
    next(new Error('unitPrice must equal floor(deposit / quantity)'));
  } else if (this.allocatedUnits > this.quantity) {
    next(new Error('allocatedUnits cannot exceed quantity'));
  } else {
    next();
  }
});
