import * as Joi from 'joi';
import {
  commonConfigSchemaKeys,
  durationSchema,
} from '../../../../../libs/common/src';

export const issuerConfigValidationSchema = Joi.object({
  ...commonConfigSchemaKeys,

  // Application
  PORT: Joi.number().default(8080),
  API_BASE_PATH: Joi.string().pattern(/^\//).default('/api/v1'),

  // JWT
  JWT_ISSUER: Joi.string().default('auth-service'),
  JWT_ACCESS_TOKEN_TTL: durationSchema().default('30m'),
  JWT_REFRESH_TOKEN_TTL: durationSchema().default('7d'),
  JWT_KEY_SIZE: Joi.number().integer().min(2048).default(2048),
  JWT_PRIVATE_KEY_FILE: Joi.string().optional(),

  // Users
  USERS_SEED_FILE: Joi.string().optional(),
  BCRYPT_ROUNDS: Joi.number().integer().min(4).max(15).optional(),
});
