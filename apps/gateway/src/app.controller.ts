import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { PublicKeyCacheService } from './modules/auth/public-key-cache.service';
import { BackendRegistryService } from './modules/proxy/backend-registry.service';
import { ProxyForwarderService } from './modules/proxy/proxy-forwarder.service';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(
    private readonly keyCache: PublicKeyCacheService,
    private readonly registry: BackendRegistryService,
    private readonly forwarder: ProxyForwarderService,
  ) {}

  @Get('health')
  getHealth() {
    return {
      status: 'healthy',
      service: 'gateway',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      public_key: this.keyCache.snapshot(),
      backends: this.registry.list().map((backend) => ({
        name: backend.name,
        circuit: this.forwarder.circuitState(backend.name),
      })),
    };
  }
}
