import { Injectable } from '@nestjs/common';
import type { KeyObject } from 'crypto';
import {
  AppLoggerService,
  identityFromClaims,
  TokenClaims,
  TokenCodecService,
  TokenError,
  TokenKind,
} from '../../../../../libs/common/src';
import { AuthFailure, AuthPolicy, AuthResult, PolicyOutcome } from './auth.types';
import { KeyUnavailableError } from './key-unavailable.error';
import { PublicKeyCacheService } from './public-key-cache.service';

const BEARER_PREFIX = 'Bearer ';

function fail(failure: AuthFailure): AuthResult {
  return { ok: false, failure };
}

/** Returns the token of an exact `Bearer <token>` header, or null. */
export function parseBearerToken(header: string): string | null {
  if (!header.startsWith(BEARER_PREFIX)) return null;
  const token = header.slice(BEARER_PREFIX.length);
  return token.length > 0 ? token : null;
}

/**
 * Verifies access tokens locally against the cached issuer key. No call to
 * the issuer happens per request.
 */
@Injectable()
export class RequestAuthenticatorService {
  constructor(
    private readonly keyCache: PublicKeyCacheService,
    private readonly tokenCodec: TokenCodecService,
    private readonly appLogger: AppLoggerService,
  ) {}

  async authenticate(authorizationHeader: string | undefined): Promise<AuthResult> {
    if (!authorizationHeader) {
      return fail({ kind: 'MissingCredentials' });
    }

    const token = parseBearerToken(authorizationHeader);
    if (token === null) {
      return fail({ kind: 'MalformedHeader' });
    }

    let key: KeyObject;
    try {
      key = await this.keyCache.getKey();
    } catch (err) {
      if (err instanceof KeyUnavailableError) {
        return fail({ kind: 'KeyUnavailable', reason: err.reason });
      }
      throw err;
    }

    let claims: TokenClaims;
    try {
      claims = this.tokenCodec.verify(token, key);
    } catch (err) {
      if (err instanceof TokenError) {
        return fail({ kind: 'InvalidToken', code: err.code });
      }
      throw err;
    }

    if (claims.tokenKind !== TokenKind.Access) {
      return fail({ kind: 'WrongTokenType' });
    }
    return { ok: true, identity: identityFromClaims(claims) };
  }

  async applyPolicy(
    policy: AuthPolicy,
    authorizationHeader: string | undefined,
  ): Promise<PolicyOutcome> {
    const result = await this.authenticate(authorizationHeader);
    if (result.ok) {
      return { action: 'continue', identity: result.identity };
    }

    if (policy === AuthPolicy.Optional) {
      if (result.failure.kind !== 'MissingCredentials') {
        this.appLogger.debug(
          `Continuing without identity on optional route: ${result.failure.kind}`,
        );
      }
      return { action: 'continue', identity: undefined };
    }

    const { kind, ...detail } = result.failure;
    this.appLogger.logSecurity(`Authentication failed: ${kind}`, detail);
    return { action: 'reject', failure: result.failure };
  }
}
