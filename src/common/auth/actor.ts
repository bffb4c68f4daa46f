import { ForbiddenException } from '@nestjs/common';
import { AccountRole } from '../enums/account-role.enum';
import { UserDocument } from '../../models/user.schema';

/**
 * The caller of a service operation, as far as authorization is concerned
 */
export interface Actor {
  id: string;
  role: AccountRole;
}

export function toActor(user: UserDocument): Actor {
  return { id: user._id.toString(), role: user.role };
}

export function isOperator(actor: Actor): boolean {
  return actor.role === AccountRole.OPERATOR;
}

/**
 * Creator-or-owner check: only the subject's creator or a platform operator
 * may perform `action`
 */
export function assertCreatorOrOperator(
  actor: Actor,
  creatorId: string,
  action: string,
): void {
  if (actor.id !== creatorId && !isOperator(actor)) {
    throw new ForbiddenException(
      `Only the creator or an operator can ${action}`,
    );
  }
}
