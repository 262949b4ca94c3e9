import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import { AuthUser, isAuthUser } from '../interfaces/auth-user.interface';

/**
 * The authenticated principal, or one of its fields:
 * `@CurrentUser() user: AuthUser`, `@CurrentUser('userId') userId: number`
 */
export const CurrentUser = createParamDecorator(
  (field: keyof AuthUser | undefined, ctx: ExecutionContext) => {
    const request = ctx.switchToHttp().getRequest<Request>();
    const user: unknown = request.user;

    if (!isAuthUser(user)) {
      throw new UnauthorizedException();
    }

    return field ? user[field] : user;
  }
);
