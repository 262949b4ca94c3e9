import { registerAs } from '@nestjs/config';

export default registerAs('auth', () => ({
  jwtSecret: process.env.JWT_SECRET,
  // Token lifetime in seconds
  jwtExpiresIn: Number.parseInt(process.env.JWT_EXPIRES_IN_SECONDS || '86400', 10),
  bcryptRounds: Number.parseInt(process.env.BCRYPT_ROUNDS || '10', 10),
  cookieDomain: process.env.COOKIE_DOMAIN,
}));
