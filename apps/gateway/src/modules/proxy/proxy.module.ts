import { Inject, MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { raw } from 'express';
import {
  gatewayConfig,
  GatewayConfig,
} from '../../common/config/configuration';
import { GatewayAuthModule } from '../auth/gateway-auth.module';
import { BackendRegistryService } from './backend-registry.service';
import { ProxyController } from './proxy.controller';
import { ProxyForwarderService } from './proxy-forwarder.service';

@Module({
  imports: [GatewayAuthModule],
  controllers: [ProxyController],
  providers: [BackendRegistryService, ProxyForwarderService],
  exports: [BackendRegistryService, ProxyForwarderService],
})
export class ProxyModule implements NestModule {
  constructor(@Inject(gatewayConfig.KEY) private readonly config: GatewayConfig) {}

  configure(consumer: MiddlewareConsumer): void {
    // raw bytes so the body can be replayed on retry and forwarded unchanged
    consumer
      .apply(raw({ type: () => true, limit: this.config.proxy.maxBodySize }))
      .forRoutes(ProxyController);
  }
}
