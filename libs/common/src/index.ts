export * from './clock';
export * from './constants';
export * from './common.module';
export * from './config/common.schema';
export * from './config/duration';
export * from './config/logging.config';
export * from './config/security.config';
export * from './filters/all-exceptions.filter';
export * from './guards/rate-limit.guard';
export * from './logging/log-levels';
export * from './middleware/request-context.middleware';
export * from './middleware/request-logging.middleware';
export * from './middleware/security-headers.middleware';
export * from './services/app-logger.service';
export * from './services/circuit-breaker.service';
export * from './services/rate-limit.service';
export * from './services/request-context.service';
export * from './token/token-codec.service';
export * from './token/token.errors';
export * from './token/token.module';
export * from './token/token.types';
