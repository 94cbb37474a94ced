import { Module } from '@nestjs/common';
import { TokenModule } from '../../../../../libs/common/src';
import { GatewayAuthGuard } from './gateway-auth.guard';
import { PublicKeyCacheService } from './public-key-cache.service';
import { HttpPublicKeySource, PUBLIC_KEY_SOURCE } from './public-key.source';
import { RequestAuthenticatorService } from './request-authenticator.service';
import { RoutePolicyService } from './route-policy.service';

@Module({
  imports: [TokenModule],
  providers: [
    { provide: PUBLIC_KEY_SOURCE, useClass: HttpPublicKeySource },
    PublicKeyCacheService,
    RequestAuthenticatorService,
    RoutePolicyService,
    GatewayAuthGuard,
  ],
  exports: [
    PublicKeyCacheService,
    RequestAuthenticatorService,
    RoutePolicyService,
    GatewayAuthGuard,
  ],
})
export class GatewayAuthModule {}
