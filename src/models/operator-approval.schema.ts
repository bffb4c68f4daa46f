import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type OperatorApprovalDocument = HydratedDocument<OperatorApproval>;

/**
 * Blanket approval: `operator` may move every token of `ownerId`
 */
@Schema({
  timestamps: true,
  collection: 'operator_approvals',
})
export class OperatorApproval {
  @Prop({ required: true, type: String })
  ownerId!: string;

  @Prop({ required: true, type: String })
  operator!: string;

  @Prop({ required: true, default: false })
  approved!: boolean;
}

export const OperatorApprovalSchema = SchemaFactory.createForClass(OperatorApproval);

OperatorApprovalSchema.index({ ownerId: 1, operator: 1 }, { unique: true });
