import { Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { AuthService } from '../auth.service';
import { UserDocument } from '../../models/user.schema';

export interface JwtPayload {
  sub: string;
  username: string;
}

/**
 * JwtStrategy
 *
 * Passport JWT strategy, bearer token from the Authorization header
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    private configService: ConfigService,
    private authService: AuthService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get<string>('jwt.secret', 'default-secret-key'),
    });
  }

  // вызывается passport после проверки подписи
  async validate(payload: JwtPayload): Promise<UserDocument> {
    return this.authService.validateUser(payload.sub);
  }
}
