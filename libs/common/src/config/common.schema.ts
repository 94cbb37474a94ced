import * as Joi from 'joi';
import { DURATION_PATTERN } from './duration';

export const durationSchema = () =>
  Joi.string().pattern(DURATION_PATTERN, 'duration');

/** Environment keys shared by every service in this repo. */
export const commonConfigSchemaKeys: Joi.SchemaMap = {
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'info', 'log', 'debug', 'verbose')
    .default('info'),
  ENABLE_TLS: Joi.boolean().default(false),
  CORS_ALLOWED_ORIGINS: Joi.string().allow('').optional(),
  RATE_LIMIT_MAX: Joi.number().integer().min(1).default(100),
  RATE_LIMIT_WINDOW: durationSchema().default('1m'),
  REDIS_URL: Joi.string()
    .uri({ scheme: ['redis', 'rediss'] })
    .optional(),
};
