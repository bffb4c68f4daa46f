import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { UserDocument } from '../../models/user.schema';

/**
 * CurrentUser decorator
 *
 * Extracts the account set on the request by JwtAuthGuard
 *
 * Usage:
 * @Get('me')
 * @UseGuards(JwtAuthGuard)
 * async getMe(@CurrentUser() user: UserDocument) { ... }
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): UserDocument => {
    const request = ctx.switchToHttp().getRequest<Request & { user: UserDocument }>();
    return request.user;
  },
);
