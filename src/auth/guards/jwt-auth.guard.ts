import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * JwtAuthGuard
 *
 * Requires a valid bearer token; sets request.user to the account
 *
 * Usage:
 * @UseGuards(JwtAuthGuard)
 * async endpoint(@CurrentUser() user: UserDocument) { ... }
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {}
