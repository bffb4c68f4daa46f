import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { AccountRole } from '../common/enums/account-role.enum';

export type UserDocument = HydratedDocument<User>;

/**
 * User (account) model
 *
 * Financial invariants:
 * - balance >= 0 (claimable, free to bid or withdraw)
 * - lockedBalance >= 0 (escrowed in open bids)
 *
 * All balance mutations MUST go through BalanceService with transactions
 */
@Schema({
  timestamps: true,
  collection: 'users',
})
export class User {
  @Prop({ required: true })
  username!: string;

  /**
   * Hashed password (bcrypt)
   * Not selected by default; use .select('+password') to include in query
   */
  @Prop({ required: false, select: false })
  password?: string;

  @Prop({ required: false })
  email?: string;

  @Prop({
    required: true,
    type: String,
    enum: Object.values(AccountRole),
    default: AccountRole.USER,
  })
  role!: AccountRole;

  @Prop({ required: true, default: 0, min: 0 })
  balance!: number;

  @Prop({ required: true, default: 0, min: 0 })
  lockedBalance!: number;

  createdAt!: Date;

  updatedAt!: Date;
}

export const UserSchema = SchemaFactory.createForClass(User);

UserSchema.index({ username: 1 }, { unique: true });

UserSchema.pre('save', function (next) {
  if (this.balance < 0 || this.lockedBalance < 0) {
    next(new Error('Balance and lockedBalance must be non-negative'));
  } else {
    next();
  }
});
