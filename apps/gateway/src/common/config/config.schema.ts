import * as Joi from 'joi';
import {
  commonConfigSchemaKeys,
  durationSchema,
} from '../../../../../libs/common/src';

export const gatewayConfigValidationSchema = Joi.object({
  ...commonConfigSchemaKeys,

  // Application
  PORT: Joi.number().default(8080),
  API_BASE_PATH: Joi.string().pattern(/^\//).default('/api/v1'),

  // Issuer public key
  ISSUER_PUBLIC_KEY_URL: Joi.string().uri({ scheme: ['http', 'https'] }).optional(),
  PUBLIC_KEY_FETCH_TIMEOUT: durationSchema().default('5s'),
  PUBLIC_KEY_CACHE_TTL: durationSchema().default('1h'),
  KEY_UNAVAILABLE_STATUS: Joi.number().valid(401, 503).default(503),
  OPTIONAL_AUTH_PATHS: Joi.string().allow('').optional(),

  // Proxy
  GATEWAY_BACKENDS: Joi.string().optional(),
  PROXY_TIMEOUT: durationSchema().default('30s'),
  PROXY_MAX_RETRIES: Joi.number().integer().min(0).default(3),
  PROXY_RETRY_DELAY: durationSchema().default('2s'),
  MAX_BODY_SIZE: Joi.string().default('10mb'),
  PROXY_BREAKER_FAILURE_THRESHOLD: Joi.number().integer().min(1).default(5),
  PROXY_BREAKER_COOLDOWN: durationSchema().default('30s'),
});
