import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { AssetStatus, ClosureOutcome } from '../common/enums/asset-status.enum';

export type AssetDocument = HydratedDocument<Asset>;

/**
 * Asset model: a physical asset split into whole shares and offered
 * by its creator through one sealed-bid primary offering
 *
 * State machine: OPEN -> CLOSED
 *
 * Invariants:
 * - totalUnits > 0
 * - 0 <= unitsRemaining <= totalUnits
 * - unitsRemaining == totalUnits while OPEN
 * - CLOSED implies outcome and closedAt are set
 * - bidCount only grows and never exceeds the configured bid-book bound
 */
@Schema({
  timestamps: true,
  collection: 'assets',
})
export class Asset {
  @Prop({ required: true, trim: true })
  name!: string;

  @Prop()
  description?: string;

  /**
   * Creator (seller) of the offering; holds every share until a successful closure
   */
  @Prop({ required: true, type: String, index: true })
  createdBy!: string;

  @Prop({ required: true, min: 1 })
  totalUnits!: number;

  /**
   * Shares not allocated to any bidder
   * After a successful closure these revert to the creator
   */
  @Prop({ required: true, min: 0 })
  unitsRemaining!: number;

  /**
   * Minimum aggregate proceeds for the offering to clear
   */
  @Prop({ required: true, min: 0 })
  reservePrice!: number;

  /**
   * Optional bidding deadline; without it the offering closes only by owner action
   */
  @Prop({ type: Date })
  biddingEndsAt?: Date;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(AssetStatus),
    default: AssetStatus.OPEN,
  })
  status!: AssetStatus;

  @Prop({ type: String, enum: Object.values(ClosureOutcome) })
  outcome?: ClosureOutcome;

  /**
   * Number of bids submitted; the next bid's sequence number
   */
  @Prop({ required: true, default: 0, min: 0 })
  bidCount!: number;

  @Prop({ default: 0, min: 0 })
  totalBidValue!: number;

  @Prop({ default: 0, min: 0 })
  proceeds!: number;

  @Prop({ default: 0, min: 0 })
  dust!: number;

  @Prop()
  closedAt?: Date;

  @Prop({ type: String })
  closedBy?: string;

  createdAt!: Date;

  updatedAt!: Date;
}

export const AssetSchema = SchemaFactory.createForClass(Asset);

AssetSchema.index({ status: 1, biddingEndsAt: 1 }); // For keeper queries
AssetSchema.index({ createdAt: -1 });

AssetSchema.pre('save', function (next) {
  if (this.unitsRemaining > this.totalUnits) {
    next(new Error('unitsRemaining cannot exceed totalUnits'));
  } else if (this.status === AssetStatus.CLOSED && !this.outcome) {
    next(new Error('closed asset must record its outcome'));
  } else {
    next();
  }
});
