import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { LedgerType } from '../common/enums/ledger-type.enum';

export type LedgerEntryDocument = HydratedDocument<LedgerEntry>;

/**
 * LedgerEntry model
 *
 * Immutable financial audit trail, one entry per balance movement.
 * Escrow accounting for a settled bid always balances:
 *   LOCK(deposit) = PAYOUT(charged) + PAYOUT(dust) + REFUND(refund)
 *
 * Invariants:
 * - amount > 0 (direction determined by type)
 * - referenceId is the bid the money moved for, or a deposit/withdrawal reference
 * - Entries are NEVER modified or deleted
 */
@Schema({
  timestamps: { createdAt: true, updatedAt: false },
  collection: 'ledger_entries',
})
export class LedgerEntry {
  @Prop({ required: true, type: String, index: true })
  userId!: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(LedgerType),
    index: true,
  })
  type!: LedgerType;

  /**
   * Always positive, integer minor units:
   * - LOCK: balance -> lockedBalance
   * - PAYOUT: lockedBalance -> (leaves the bidder)
   * - PROCEEDS / DUST / DEPOSIT: -> balance
   * - REFUND: lockedBalance -> balance
   * - WITHDRAWAL: balance -> (leaves the platform)
   */
  @Prop({ required: true, min: 1 })
  amount!: number;

  @Prop({ required: true, type: String, index: true })
  referenceId!: string;

  @Prop()
  description?: string;

  createdAt!: Date;
}

export const LedgerEntrySchema = SchemaFactory.createForClass(LedgerEntry);

LedgerEntrySchema.index({ userId: 1, createdAt: -1 }); // User's transaction history
LedgerEntrySchema.index({ referenceId: 1, type: 1 }); // Entries for one bid

LedgerEntrySchema.pre(['updateOne', 'findOneAndUpdate', 'deleteOne'], function (next) {
  next(new Error('Ledger entries are immutable and cannot be modified or deleted'));
});
