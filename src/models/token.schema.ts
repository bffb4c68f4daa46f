import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type TokenDocument = HydratedDocument<Token>;

/**
 * Token model: one non-fungible token in the registry
 *
 * `approved` is the single operator allowed to move this token besides its
 * owner; it is cleared on every transfer.
 */
@Schema({
  timestamps: true,
  collection: 'tokens',
})
export class Token {
  @Prop({ required: true, min: 1 })
  tokenId!: number;

  @Prop({ required: true, type: String, index: true })
  ownerId!: string;

  @Prop({ type: String })
  approved?: string;

  @Prop({ required: true })
  name!: string;

  @Prop()
  uri?: string;
}

export const TokenSchema = SchemaFactory.createForClass(Token);

TokenSchema.index({ tokenId: 1 }, { unique: true });
