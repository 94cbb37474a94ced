import { INestApplication } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { securityConfig } from '../../../libs/common/src';
import { gatewayConfig, GatewayConfig } from './common/config/configuration';

/**
 * HTTP-level setup shared by main.ts and the e2e tests. The app must be
 * created with `bodyParser: false`; the proxy module parses raw bodies itself.
 */
export function configureGatewayApp(app: INestApplication): GatewayConfig {
  const config = app.get<GatewayConfig>(gatewayConfig.KEY);
  const security = app.get<ConfigType<typeof securityConfig>>(securityConfig.KEY);

  app.setGlobalPrefix(config.app.apiBasePath, { exclude: ['health'] });
  app.enableCors({
    origin: security.allowedOrigins.length > 0 ? security.allowedOrigins : true,
    credentials: true,
  });
  app.enableShutdownHooks();

  return config;
}
