import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { Request } from 'express';
import { Strategy } from 'passport-jwt';
import { SessionService } from '../../session/session.service';
import { extractAuthToken } from '../auth-token.util';
import {
  AuthUser,
  isJwtPayload,
  toAuthUser,
} from '../interfaces/auth-user.interface';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly sessionService: SessionService
  ) {
    super({
      jwtFromRequest: extractAuthToken,
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('auth.jwtSecret'),
      passReqToCallback: true,
    });
  }

  async validate(request: Request, payload: unknown): Promise<AuthUser> {
    const token = extractAuthToken(request);
    if (token && (await this.sessionService.isTokenBlacklisted(token))) {
      throw new UnauthorizedException('Token has been revoked');
    }

    if (!isJwtPayload(payload)) {
      throw new UnauthorizedException('Malformed token');
    }
    return toAuthUser(payload);
  }
}
