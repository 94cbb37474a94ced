import { CanActivate, ExecutionContext, Inject, Injectable } from '@nestjs/common';
import { RequestContextService } from '../../../../../libs/common/src';
import {
  gatewayConfig,
  GatewayConfig,
} from '../../common/config/configuration';
import { mapAuthFailure } from './auth-failure.mapper';
import type { GatewayRequest } from './gateway-request.interface';
import { RequestAuthenticatorService } from './request-authenticator.service';
import { RoutePolicyService } from './route-policy.service';

@Injectable()
export class GatewayAuthGuard implements CanActivate {
  constructor(
    private readonly authenticator: RequestAuthenticatorService,
    private readonly routePolicy: RoutePolicyService,
    private readonly requestContext: RequestContextService,
    @Inject(gatewayConfig.KEY) private readonly config: GatewayConfig,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<GatewayRequest>();
    const policy = this.routePolicy.resolve(request.path);

    const outcome = await this.authenticator.applyPolicy(
      policy,
      request.headers.authorization,
    );
    if (outcome.action === 'reject') {
      throw mapAuthFailure(outcome.failure, this.config.auth.keyUnavailableStatus);
    }

    request.identity = outcome.identity;
    if (outcome.identity) {
      this.requestContext.set('subjectId', outcome.identity.subjectId);
    }
    return true;
  }
}
