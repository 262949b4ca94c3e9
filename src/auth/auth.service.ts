import {
  BadRequestException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { v4 as uuidv4 } from 'uuid';
import { SessionService } from '../session/session.service';
import { TutoringSessionStore } from '../tutoring/tutoring-session.store';
import { User, UserProfile } from '../user/interfaces/user.interface';
import { UserService } from '../user/user.service';
import { LoginDto, SignupDto } from './dto/auth.dto';
import {
  AuthUser,
  GUEST_USERNAME,
  JwtPayload,
  guestOwnerKey,
  userOwnerKey,
} from './interfaces/auth-user.interface';

const MIN_PASSWORD_LENGTH = 6;

export interface ClientInfo {
  ipAddress?: string;
  userAgent?: string;
}

export interface AuthUserSummary {
  id: number | null;
  username: string;
  isGuest: boolean;
}

export interface AuthResult {
  user: AuthUserSummary;
  accessToken: string;
}

export interface GuestProfile {
  username: string;
  isGuest: true;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly userService: UserService,
    private readonly jwtService: JwtService,
    private readonly sessionService: SessionService,
    private readonly tutoringSessionStore: TutoringSessionStore
  ) {}

  /**
   * Creates the account without signing in; the client logs in next.
   */
  async signup(
    signupDto: SignupDto
  ): Promise<{ message: string; user: AuthUserSummary }> {
    const { username, password, confirmPassword } = signupDto;

    if (password !== confirmPassword) {
      throw new BadRequestException('Passwords do not match');
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw new BadRequestException(
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`
      );
    }

    const user = await this.userService.createUser(username.trim(), password);
    this.logger.log(`User ${user.id} signed up`);

    return {
      message: 'Account created successfully! Please login.',
      user: this.summarise(user),
    };
  }

  async login(loginDto: LoginDto, client: ClientInfo = {}): Promise<AuthResult> {
    const user = await this.userService.authenticate(
      loginDto.username.trim(),
      loginDto.password
    );

    if (!user) {
      throw new UnauthorizedException('Invalid username or password');
    }

    const payload: JwtPayload = {
      sub: userOwnerKey(user.id),
      uid: user.id,
      username: user.username,
      guest: false,
    };
    const accessToken = await this.jwtService.signAsync(payload);

    await this.sessionService.createSession({
      userId: user.id,
      username: user.username,
      token: accessToken,
      ipAddress: client.ipAddress,
      userAgent: client.userAgent,
    });

    return { user: this.summarise(user), accessToken };
  }

  /**
   * Token for an anonymous principal. Guests get no login session and
   * nothing they do is persisted.
   */
  async continueAsGuest(): Promise<AuthResult> {
    const payload: JwtPayload = {
      sub: guestOwnerKey(uuidv4()),
      uid: null,
      username: GUEST_USERNAME,
      guest: true,
    };
    const accessToken = await this.jwtService.signAsync(payload);

    return {
      user: { id: null, username: GUEST_USERNAME, isGuest: true },
      accessToken,
    };
  }

  getCurrentUser(user: AuthUser): UserProfile | GuestProfile {
    if (user.isGuest || user.userId === null) {
      return { username: user.username, isGuest: true };
    }
    return this.userService.getProfile(user.userId);
  }

  /**
   * Blacklists the token for the rest of its lifetime, drops its login
   * session and discards the principal's tutoring sessions.
   */
  async logout(user: AuthUser, token: string | null): Promise<void> {
    if (token) {
      const remainingTime = this.calculateTokenRemainingTime(token);
      if (remainingTime > 0) {
        await this.sessionService.blacklistToken(token, remainingTime);
      }
      await this.sessionService.invalidateSession(token);
    }

    await this.tutoringSessionStore.clearOwner(user.ownerKey);
  }

  /**
   * Seconds until the token expires; 0 when it has no readable expiry
   */
  calculateTokenRemainingTime(token: string): number {
    const decoded: unknown = this.jwtService.decode(token);
    if (
      typeof decoded !== 'object' ||
      decoded === null ||
      !('exp' in decoded) ||
      typeof decoded.exp !== 'number'
    ) {
      return 0;
    }

    const now = Math.floor(Date.now() / 1000);
    return Math.max(decoded.exp - now, 0);
  }

  private summarise(user: User): AuthUserSummary {
    return { id: user.id, username: user.username, isGuest: false };
  }
}
