import { ConfigService } from '@nestjs/config';
import { createCache } from 'cache-manager';
import { createHash } from 'node:crypto';
import { CacheService } from '../common/services/cache.service';
import { SessionData } from './interfaces/session.interface';
import { SessionService } from './session.service';

describe('SessionService', () => {
  let cacheService: CacheService;
  let service: SessionService;

  const sessionKey = (token: string) =>
    `session:${createHash('sha256').update(token).digest('hex')}`;

  beforeEach(() => {
    cacheService = new CacheService(createCache());
    service = new SessionService(
      cacheService,
      new ConfigService({ auth: { jwtExpiresIn: 3600 } })
    );
  });

  it('should store the session under the token hash', async () => {
    const sessionId = await service.createSession({
      userId: 1,
      username: 'ada',
      token: 'token-a',
      userAgent: 'jest',
    });

    expect(sessionId).toMatch(/^[0-9a-f]{64}$/);
    expect(`session:${sessionId}`).toBe(sessionKey('token-a'));

    const stored = await cacheService.get<SessionData>(sessionKey('token-a'));
    expect(stored).toMatchObject({
      userId: 1,
      username: 'ada',
      userAgent: 'jest',
    });
    if (stored) {
      expect(
        new Date(stored.expiresAt).getTime() -
          new Date(stored.createdAt).getTime()
      ).toBe(3600 * 1000);
    }
  });

  it('should drop a session by its token', async () => {
    await service.createSession({ userId: 1, username: 'ada', token: 'token-a' });
    await service.createSession({ userId: 1, username: 'ada', token: 'token-b' });

    await service.invalidateSession('token-a');

    expect(await cacheService.get(sessionKey('token-a'))).toBeNull();
    expect(await cacheService.get(sessionKey('token-b'))).toMatchObject({
      userId: 1,
    });
  });

  it('should ignore unknown tokens on invalidation', async () => {
    await expect(service.invalidateSession('unknown')).resolves.toBeUndefined();
  });

  it('should blacklist tokens', async () => {
    expect(await service.isTokenBlacklisted('token-a')).toBe(false);

    await service.blacklistToken('token-a', 60);

    expect(await service.isTokenBlacklisted('token-a')).toBe(true);
    expect(await service.isTokenBlacklisted('token-b')).toBe(false);
  });
});
