import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type HoldingDocument = HydratedDocument<Holding>;

/**
 * Holding model: (asset, holder) -> whole shares
 *
 * The share ledger is the single source of truth for ownership; the
 * secondary market reads and moves shares only through HoldingsService.
 *
 * Invariants:
 * - units >= 1 (entries are deleted when they reach zero)
 * - one entry per (assetId, holderId)
 */
@Schema({
  timestamps: true,
  collection: 'holdings',
})
export class Holding {
  @Prop({ required: true, type: String })
  assetId!: string;

  @Prop({ required: true, type: String })
  holderId!: string;

  @Prop({ required: true, min: 1 })
  units!: number;
}

export const HoldingSchema = SchemaFactory.createForClass(Holding);

HoldingSchema.index({ assetId: 1, holderId: 1 }, { unique: true });
HoldingSchema.index({ holderId: 1 });
