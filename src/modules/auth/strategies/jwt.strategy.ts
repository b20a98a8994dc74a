import { ExtractJwt, Strategy } from 'passport-jwt';
import { PassportStrategy } from '@nestjs/passport';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { AuthConfig } from '../../../config/auth.config';
import { User } from '../../users/entities/user.entity';
import { AuthService } from '../auth.service';
import { TokenKind } from '../enums/token-kind.enum';
import { JWT_STRATEGY } from '../decorators/auth.decorator';

/**
 * passport-jwt rejects bad signatures and expired tokens up front; the kind
 * check, the denylist lookup and the account lookup happen in
 * AuthService.resolveIdentity.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, JWT_STRATEGY) {
  constructor(
    configService: ConfigService,
    private authService: AuthService,
  ) {
    const auth = configService.getOrThrow<AuthConfig>('auth');
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: auth.jwtSecret,
      algorithms: [auth.jwtAlgorithm],
      passReqToCallback: true,
    });
  }

  async validate(req: Request): Promise<User> {
    const token = ExtractJwt.fromAuthHeaderAsBearerToken()(req);
    if (!token) {
      throw new UnauthorizedException();
    }
    return this.authService.resolveIdentity(token, TokenKind.ACCESS);
  }
}
