import { Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { AuthService, JwtPayload } from '../auth.service';
import { UserDocument } from '../../models/user.schema';

/**
 * JwtStrategy
 *
 * Bearer token from the Authorization header. The account is reloaded on
 * every request, so the role comes from the database, not the token.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private authService: AuthService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.get<string>('jwt.secret', 'default-secret-key'),
    });
  }

  async validate(payload: JwtPayload): Promise<UserDocument> {
    return this.authService.validateUser(payload.sub);
  }
}
