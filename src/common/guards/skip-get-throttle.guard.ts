import { Injectable, ExecutionContext } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { Request } from 'express';

/**
 * ThrottlerGuard that skips GET requests: reads are not rate limited,
 * every mutating request is.
 */
@Injectable()
export class SkipGetThrottleGuard extends ThrottlerGuard {
  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();

    if (request.method === 'GET') {
      return true;
    }

    return super.canActivate(context);
  }
}
