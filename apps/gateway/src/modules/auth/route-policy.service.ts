import { Inject, Injectable } from '@nestjs/common';
import {
  gatewayConfig,
  GatewayConfig,
} from '../../common/config/configuration';
import { AuthPolicy } from './auth.types';

@Injectable()
export class RoutePolicyService {
  private readonly optionalPrefixes: string[];

  constructor(@Inject(gatewayConfig.KEY) config: GatewayConfig) {
    this.optionalPrefixes = config.auth.optionalPaths.map((path) =>
      path.endsWith('/') ? path.slice(0, -1) : path,
    );
  }

  resolve(path: string): AuthPolicy {
    const isOptional = this.optionalPrefixes.some(
      (prefix) => path === prefix || path.startsWith(`${prefix}/`),
    );
    return isOptional ? AuthPolicy.Optional : AuthPolicy.Required;
  }
}
