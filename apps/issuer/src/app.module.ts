import {
  MiddlewareConsumer,
  Module,
  NestModule,
  ValidationPipe,
} from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD, APP_PIPE } from '@nestjs/core';
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
import { issuerConfigValidationSchema } from './common/config/config.schema';
import { issuerConfig } from './common/config/configuration';
import { JwtAuthGuard } from './common/guards/jwt-auth.guard';
import { AuthModule } from './modules/auth/auth.module';
import { KeysModule } from './modules/keys/keys.module';
import { UsersModule } from './modules/users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [issuerConfig, loggingConfig, securityConfig],
      envFilePath: ['.env.local', '.env'],
      validationSchema: issuerConfigValidationSchema,
      validationOptions: {
        allowUnknown: true,
        abortEarly: false,
      },
    }),
    CommonModule.forRoot({ serviceName: 'auth' }),
    KeysModule,
    UsersModule,
    AuthModule,
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({
        transform: true, // Automatically transform payloads to DTO instances
        whitelist: true, // Strip properties that do not have decorators
        forbidNonWhitelisted: true, // Throw error if non-whitelisted properties are present
        forbidUnknownValues: true,
        disableErrorMessages: process.env.NODE_ENV === 'production',
      }),
    },
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
    {
      provide: APP_GUARD,
      useClass: RateLimitGuard,
    },
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard,
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
