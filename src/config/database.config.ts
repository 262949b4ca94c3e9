import { registerAs } from '@nestjs/config';

export default registerAs('database', () => ({
  // ':memory:' keeps the database in-process and never writes a file
  path: process.env.DATABASE_PATH || 'data/tutor.db',
}));
