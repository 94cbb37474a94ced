import { INestApplication } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { securityConfig } from '../../../libs/common/src';
import { issuerConfig, IssuerConfig } from './common/config/configuration';

/**
 * HTTP-level setup shared by main.ts and the e2e tests: route prefix and
 * CORS. Everything else is wired through AppModule.
 */
export function configureIssuerApp(app: INestApplication): IssuerConfig {
  const config = app.get<IssuerConfig>(issuerConfig.KEY);
  const security = app.get<ConfigType<typeof securityConfig>>(securityConfig.KEY);

  app.setGlobalPrefix(config.app.apiBasePath, { exclude: ['health'] });
  app.enableCors({
    origin: security.allowedOrigins.length > 0 ? security.allowedOrigins : true,
    credentials: true,
  });
  app.enableShutdownHooks();

  return config;
}
