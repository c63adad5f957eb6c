import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * JwtAuthGuard
 *
 * Requires a valid bearer token, the resolved account lands on request.user
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {}
