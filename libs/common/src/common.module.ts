import { DynamicModule, Global, Module } from '@nestjs/common';
import { SERVICE_NAME } from './constants';
import { AppLoggerService } from './services/app-logger.service';
import { RateLimitService } from './services/rate-limit.service';
import { RequestContextService } from './services/request-context.service';

export interface CommonModuleOptions {
  /** Short service name, reported in the `Server` response header. */
  serviceName: string;
}

@Global()
@Module({})
export class CommonModule {
  static forRoot(options: CommonModuleOptions): DynamicModule {
    return {
      module: CommonModule,
      global: true,
      providers: [
        { provide: SERVICE_NAME, useValue: options.serviceName },
        RequestContextService,
        AppLoggerService,
        RateLimitService,
      ],
      exports: [
        SERVICE_NAME,
        RequestContextService,
        AppLoggerService,
        RateLimitService,
      ],
    };
  }
}
