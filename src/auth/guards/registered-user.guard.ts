import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import { Request } from 'express';
import { isAuthUser } from '../interfaces/auth-user.interface';

/**
 * Lets through registered users only. Runs after JwtAuthGuard.
 */
@Injectable()
export class RegisteredUserGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const user: unknown = context.switchToHttp().getRequest<Request>().user;

    if (!isAuthUser(user) || user.isGuest || user.userId === null) {
      throw new ForbiddenException('This feature requires a registered account');
    }
    return true;
  }
}
