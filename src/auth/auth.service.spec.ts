import {
  BadRequestException,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { DeepMockProxy, mockDeep } from 'jest-mock-extended';
import { SessionService } from '../session/session.service';
import { TutoringSessionStore } from '../tutoring/tutoring-session.store';
import { UserService } from '../user/user.service';
import { AuthService } from './auth.service';
import { AuthUser, isJwtPayload } from './interfaces/auth-user.interface';

describe('AuthService', () => {
  let service: AuthService;
  let jwtService: JwtService;
  let userService: DeepMockProxy<UserService>;
  let sessionService: DeepMockProxy<SessionService>;
  let tutoringSessionStore: DeepMockProxy<TutoringSessionStore>;

  const ada = { id: 7, username: 'ada', createdAt: '2024-03-01 10:00:00' };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AuthService,
        {
          provide: JwtService,
          useValue: new JwtService({
            secret: 'test-secret',
            signOptions: { expiresIn: 3600 },
          }),
        },
        { provide: UserService, useValue: mockDeep<UserService>() },
        { provide: SessionService, useValue: mockDeep<SessionService>() },
        {
          provide: TutoringSessionStore,
          useValue: mockDeep<TutoringSessionStore>(),
        },
      ],
    }).compile();

    service = module.get<AuthService>(AuthService);
    jwtService = module.get<JwtService>(JwtService);
    userService = module.get(UserService);
    sessionService = module.get(SessionService);
    tutoringSessionStore = module.get(TutoringSessionStore);
  });

  describe('signup', () => {
    it('should create the account without issuing a token', async () => {
      userService.createUser.mockResolvedValue(ada);

      const result = await service.signup({
        username: ' ada ',
        password: 'secret1',
        confirmPassword: 'secret1',
      });

      expect(result).toEqual({
        message: 'Account created successfully! Please login.',
        user: { id: 7, username: 'ada', isGuest: false },
      });
      expect(userService.createUser).toHaveBeenCalledWith('ada', 'secret1');
    });

    it('should reject mismatched passwords', async () => {
      await expect(
        service.signup({
          username: 'ada',
          password: 'secret1',
          confirmPassword: 'secret2',
        })
      ).rejects.toThrow(new BadRequestException('Passwords do not match'));
      expect(userService.createUser).not.toHaveBeenCalled();
    });

    it('should report a mismatch before a short password', async () => {
      await expect(
        service.signup({ username: 'ada', password: 'abc', confirmPassword: 'abd' })
      ).rejects.toThrow(new BadRequestException('Passwords do not match'));
    });

    it('should reject a password under 6 characters', async () => {
      await expect(
        service.signup({ username: 'ada', password: 'abc', confirmPassword: 'abc' })
      ).rejects.toThrow(
        new BadRequestException('Password must be at least 6 characters long')
      );
      expect(userService.createUser).not.toHaveBeenCalled();
    });
  });

  describe('login', () => {
    it('should sign a user token and record the session', async () => {
      userService.authenticate.mockResolvedValue(ada);

      const result = await service.login(
        { username: 'ada', password: 'secret1' },
        { ipAddress: '127.0.0.1', userAgent: 'jest' }
      );

      expect(result.user).toEqual({ id: 7, username: 'ada', isGuest: false });
      const payload: unknown = jwtService.verify(result.accessToken);
      expect(isJwtPayload(payload)).toBe(true);
      expect(payload).toMatchObject({
        sub: 'user:7',
        uid: 7,
        username: 'ada',
        guest: false,
      });
      expect(sessionService.createSession).toHaveBeenCalledWith({
        userId: 7,
        username: 'ada',
        token: result.accessToken,
        ipAddress: '127.0.0.1',
        userAgent: 'jest',
      });
    });

    it('should reject bad credentials', async () => {
      userService.authenticate.mockResolvedValue(null);

      await expect(
        service.login({ username: 'ada', password: 'wrong-pass' })
      ).rejects.toThrow(
        new UnauthorizedException('Invalid username or password')
      );
      expect(sessionService.createSession).not.toHaveBeenCalled();
    });
  });

  describe('continueAsGuest', () => {
    it('should issue a guest token with its own owner key', async () => {
      const first = await service.continueAsGuest();
      const second = await service.continueAsGuest();

      expect(first.user).toEqual({ id: null, username: 'Guest', isGuest: true });
      const payload: unknown = jwtService.verify(first.accessToken);
      expect(payload).toMatchObject({ uid: null, guest: true });

      const other: unknown = jwtService.verify(second.accessToken);
      expect(isJwtPayload(payload) && isJwtPayload(other)).toBe(true);
      if (isJwtPayload(payload) && isJwtPayload(other)) {
        expect(payload.sub).toMatch(/^guest:/);
        expect(payload.sub).not.toBe(other.sub);
      }
    });
  });

  describe('getCurrentUser', () => {
    it('should describe a guest without touching the database', () => {
      const guest: AuthUser = {
        ownerKey: 'guest:abc',
        userId: null,
        username: 'Guest',
        isGuest: true,
      };

      expect(service.getCurrentUser(guest)).toEqual({
        username: 'Guest',
        isGuest: true,
      });
      expect(userService.getProfile).not.toHaveBeenCalled();
    });

    it('should return the profile of a registered user', () => {
      const profile = {
        ...ada,
        statistics: {
          learnSessions: 1,
          quizzesTaken: 0,
          averageProgress: 40,
          averageQuizPercentage: 0,
        },
      };
      userService.getProfile.mockReturnValue(profile);

      expect(
        service.getCurrentUser({
          ownerKey: 'user:7',
          userId: 7,
          username: 'ada',
          isGuest: false,
        })
      ).toBe(profile);
    });
  });

  describe('logout', () => {
    const user: AuthUser = {
      ownerKey: 'user:7',
      userId: 7,
      username: 'ada',
      isGuest: false,
    };

    it('should blacklist the token and discard tutoring sessions', async () => {
      const token = await jwtService.signAsync({ sub: 'user:7' });

      await service.logout(user, token);

      expect(sessionService.blacklistToken).toHaveBeenCalledWith(
        token,
        expect.any(Number)
      );
      const [, seconds] = sessionService.blacklistToken.mock.calls[0];
      expect(seconds).toBeGreaterThan(3500);
      expect(seconds).toBeLessThanOrEqual(3600);
      expect(sessionService.invalidateSession).toHaveBeenCalledWith(token);
      expect(tutoringSessionStore.clearOwner).toHaveBeenCalledWith('user:7');
    });

    it('should still clear sessions without a token', async () => {
      await service.logout(user, null);

      expect(sessionService.blacklistToken).not.toHaveBeenCalled();
      expect(tutoringSessionStore.clearOwner).toHaveBeenCalledWith('user:7');
    });
  });

  describe('calculateTokenRemainingTime', () => {
    it('should return 0 for an unreadable token', () => {
      expect(service.calculateTokenRemainingTime('not-a-token')).toBe(0);
    });

    it('should return 0 for an expired token', () => {
      const token = jwtService.sign(
        { sub: 'user:7' },
        { expiresIn: -10 }
      );

      expect(service.calculateTokenRemainingTime(token)).toBe(0);
    });
  });
});
