import { registerAs } from '@nestjs/config';
import { parseDuration } from './duration';

function parseList(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export const securityConfig = registerAs('security', () => ({
  enableTls: process.env.ENABLE_TLS === 'true',
  allowedOrigins: parseList(process.env.CORS_ALLOWED_ORIGINS),
  rateLimit: {
    max: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),
    windowMs: parseDuration(process.env.RATE_LIMIT_WINDOW || '1m'),
  },
  redisUrl: process.env.REDIS_URL || undefined,
}));
