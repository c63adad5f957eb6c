import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { UserDocument } from '../../models/user.schema';

interface AuthenticatedRequest extends Request {
  user: UserDocument;
}

/**
 * CurrentUser decorator
 *
 * Extracts the account resolved by JwtAuthGuard
 *
 * Usage:
 * @Post(':tokenId/bids')
 * @UseGuards(JwtAuthGuard)
 * async placeBid(@CurrentUser() user: UserDocument) { ... }
 */
export const CurrentUser = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): UserDocument => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    return request.user;
  },
);
