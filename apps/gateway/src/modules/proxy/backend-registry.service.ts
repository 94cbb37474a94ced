import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  gatewayConfig,
  GatewayConfig,
} from '../../common/config/configuration';

export interface BackendTarget {
  name: string;
  baseUrl: string;
}

@Injectable()
export class BackendRegistryService {
  private readonly logger = new Logger(BackendRegistryService.name);
  private readonly backends = new Map<string, BackendTarget>();

  constructor(@Inject(gatewayConfig.KEY) config: GatewayConfig) {
    for (const [name, baseUrl] of Object.entries(config.proxy.backends)) {
      this.backends.set(name, {
        name,
        baseUrl: baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl,
      });
    }
    this.logger.log(
      `Registered backends: ${[...this.backends.keys()].join(', ') || '(none)'}`,
    );
  }

  resolve(name: string): BackendTarget | undefined {
    return this.backends.get(name);
  }

  list(): BackendTarget[] {
    return [...this.backends.values()];
  }
}
