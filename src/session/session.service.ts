import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash } from 'node:crypto';
import { CacheService } from '../common/services/cache.service';
import { SessionData, CreateSessionDto } from './interfaces/session.interface';

/**
 * Login sessions and the token blacklist, both kept in the cache. Session
 * ids are the SHA-256 of the access token, so a token alone is enough to
 * find its session at logout.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private readonly sessionTtlSeconds: number;

  constructor(
    private readonly cacheService: CacheService,
    configService: ConfigService
  ) {
    // Sessions live as long as the token they were created for
    this.sessionTtlSeconds = configService.get<number>(
      'auth.jwtExpiresIn',
      86400
    );
  }

  async createSession(dto: CreateSessionDto): Promise<string> {
    const sessionId = this.hashToken(dto.token);
    const now = new Date();

    const sessionData: SessionData = {
      userId: dto.userId,
      username: dto.username,
      ipAddress: dto.ipAddress,
      userAgent: dto.userAgent,
      createdAt: now.toISOString(),
      expiresAt: new Date(
        now.getTime() + this.sessionTtlSeconds * 1000
      ).toISOString(),
    };

    await this.cacheService.set(
      `session:${sessionId}`,
      sessionData,
      this.sessionTtlSeconds * 1000
    );

    this.logger.log(`Session created for user ${dto.userId}`);
    return sessionId;
  }

  async invalidateSession(token: string): Promise<void> {
    const sessionId = this.hashToken(token);
    const session = await this.cacheService.get<SessionData>(
      `session:${sessionId}`
    );

    if (session) {
      await this.cacheService.invalidate(`session:${sessionId}`);
      this.logger.log(`Session invalidated for user ${session.userId}`);
    }
  }

  async isTokenBlacklisted(token: string): Promise<boolean> {
    const blacklisted = await this.cacheService.get<boolean>(
      `blacklist:${this.hashToken(token)}`
    );
    return blacklisted === true;
  }

  async blacklistToken(token: string, expiresInSeconds: number): Promise<void> {
    await this.cacheService.set(
      `blacklist:${this.hashToken(token)}`,
      true,
      expiresInSeconds * 1000
    );
    this.logger.log('Token blacklisted');
  }

  private hashToken(token: string): string {
    return createHash('sha256').update(token).digest('hex');
  }
}
