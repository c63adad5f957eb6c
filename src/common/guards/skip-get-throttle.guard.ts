import { Injectable, ExecutionContext } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { Request } from 'express';

/**
 * ThrottlerGuard that skips throttling for GET requests
 * Reads are side-effect free, bids and withdrawals stay rate limited
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
