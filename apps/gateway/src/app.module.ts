import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import {
  AllExceptionsFilter,
  CommonModule,
  loggingConfig,
  RateLimitGuard,
  RequestContextMiddleware,
  RequestLoggingMiddleware,
  securityConfig,
  SecurityHeadersMiddleware,
} from '../../../libs/common/src';
import { AppController } from './app.controller';
import { gatewayConfigValidationSchema } from './common/config/config.schema';
import { gatewayConfig } from './common/config/configuration';
import { GatewayAuthModule } from './modules/auth/gateway-auth.module';
import { ProxyModule } from './modules/proxy/proxy.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [gatewayConfig, loggingConfig, securityConfig],
      envFilePath: ['.env.local', '.env'],
      validationSchema: gatewayConfigValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
    }),
    CommonModule.forRoot({ serviceName: 'gateway' }),
    GatewayAuthModule,
    ProxyModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
    {
      provide: APP_GUARD,
      useClass: RateLimitGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(
        RequestContextMiddleware,
        SecurityHeadersMiddleware,
        RequestLoggingMiddleware,
      )
      .forRoutes('*');
  }
}
