import { registerAs } from '@nestjs/config';

export default registerAs('tutoring', () => ({
  sessionTtlMs: Number.parseInt(
    process.env.TUTORING_SESSION_TTL_MS || '14400000',
    10
  ), // 4 hours
}));
