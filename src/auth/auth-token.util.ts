import { Request } from 'express';
import { ExtractJwt } from 'passport-jwt';

export const AUTH_COOKIE = 'Authentication';

const fromBearerHeader = ExtractJwt.fromAuthHeaderAsBearerToken();

/**
 * Access token from the `Authentication` cookie, falling back to an
 * `Authorization: Bearer` header
 */
export function extractAuthToken(request: Request): string | null {
  const cookies: unknown = request.cookies;
  if (typeof cookies === 'object' && cookies !== null && AUTH_COOKIE in cookies) {
    const { [AUTH_COOKIE]: token } = cookies;
    if (typeof token === 'string' && token.length > 0) {
      return token;
    }
  }
  return fromBearerHeader(request);
}
