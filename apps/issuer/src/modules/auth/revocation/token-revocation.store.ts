import { Injectable } from '@nestjs/common';
import type {
  AuthenticatedIdentity,
  TokenClaims,
} from '../../../../../../libs/common/src';

export const TOKEN_REVOCATION_STORE = Symbol('TOKEN_REVOCATION_STORE');

/**
 * Where refresh tokens would be revoked. Swap the provider bound to
 * TOKEN_REVOCATION_STORE to make logout and refresh stateful.
 */
export interface TokenRevocationStore {
  /** Resolves true only when the token is now actually unusable. */
  revoke(refreshToken: string, owner: AuthenticatedIdentity): Promise<boolean>;
  isRevoked(refreshToken: string, claims: TokenClaims): Promise<boolean>;
}

/** Keeps no state: logout revokes nothing and no token is ever revoked. */
@Injectable()
export class StatelessRevocationStore implements TokenRevocationStore {
  revoke(): Promise<boolean> {
    return Promise.resolve(false);
  }

  isRevoked(): Promise<boolean> {
    return Promise.resolve(false);
  }
}
