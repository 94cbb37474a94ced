import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import {
  AuthenticatedIdentity,
  claimsFromPayload,
  identityFromClaims,
  SIGNING_ALGORITHM,
  TokenKind,
} from '../../../../../../libs/common/src';
import { KeyManagerService } from '../../keys/key-manager.service';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(keyManager: KeyManagerService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      algorithms: [SIGNING_ALGORITHM],
      // keys only exist after KeyManagerService.onModuleInit, which runs after construction
      secretOrKeyProvider: (
        _request: unknown,
        _rawJwtToken: unknown,
        done: (err: unknown, secretOrKey?: string) => void,
      ) => {
        try {
          done(null, keyManager.exportPublicKeyPem());
        } catch (err) {
          done(err);
        }
      },
    });
  }

  validate(payload: unknown): AuthenticatedIdentity {
    const claims = claimsFromPayload(payload);
    if (!claims || claims.tokenKind !== TokenKind.Access) {
      throw new UnauthorizedException('Invalid or expired token');
    }
    return identityFromClaims(claims);
  }
}
