import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import type { KeyObject } from 'crypto';
import {
  decode,
  JsonWebTokenError,
  Jwt,
  NotBeforeError,
  TokenExpiredError,
  verify as verifyJwt,
} from 'jsonwebtoken';
import { CLOCK, Clock } from '../clock';
import { TokenError, TokenErrorCode } from './token.errors';
import {
  claimsFromPayload,
  SIGNING_ALGORITHM,
  TokenClaims,
  TokenKind,
  TokenPayload,
  TokenSubject,
} from './token.types';

export interface SignTokenOptions {
  issuer: string;
  ttlSeconds: number;
}

/**
 * Signs and verifies RS256 JWTs. Only RS256 is ever accepted on verify and
 * no clock leeway is applied to `exp` or `nbf`.
 */
@Injectable()
export class TokenCodecService {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  sign(
    subject: TokenSubject,
    kind: TokenKind,
    privateKey: KeyObject,
    options: SignTokenOptions,
  ): string {
    const now = Math.floor(this.clock.now() / 1000);
    const payload: Omit<TokenPayload, 'iss'> = {
      user_id: subject.subjectId,
      email: subject.email,
      is_admin: subject.isAdmin,
      type: kind,
      sub: subject.subjectId,
      iat: now,
      nbf: now,
      exp: now + options.ttlSeconds,
    };

    return this.jwtService.sign(payload, {
      privateKey,
      algorithm: SIGNING_ALGORITHM,
      issuer: options.issuer,
    });
  }

  verify(token: string, publicKey: KeyObject): TokenClaims {
    this.assertSigningAlgorithm(token);

    let payload: unknown;
    try {
      payload = verifyJwt(token, publicKey, {
        algorithms: [SIGNING_ALGORITHM],
        clockTimestamp: Math.floor(this.clock.now() / 1000),
      });
    } catch (err) {
      throw this.translate(err);
    }

    const claims = claimsFromPayload(payload);
    if (!claims) {
      throw new TokenError(
        TokenErrorCode.MalformedToken,
        'Token payload is missing required claims',
      );
    }
    return claims;
  }

  private assertSigningAlgorithm(token: string): void {
    let decoded: Jwt | null;
    try {
      decoded = decode(token, { complete: true });
    } catch (err) {
      throw new TokenError(
        TokenErrorCode.MalformedToken,
        `Token could not be decoded: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    if (decoded === null) {
      throw new TokenError(TokenErrorCode.MalformedToken, 'Token is malformed');
    }
    if (decoded.header.alg !== SIGNING_ALGORITHM) {
      throw new TokenError(
        TokenErrorCode.WrongAlgorithm,
        `Unexpected signing method: ${decoded.header.alg}`,
      );
    }
  }

  private translate(err: unknown): Error {
    if (err instanceof TokenExpiredError) {
      return new TokenError(TokenErrorCode.Expired, 'Token has expired');
    }
    if (err instanceof NotBeforeError) {
      return new TokenError(TokenErrorCode.NotYetValid, 'Token is not valid yet');
    }
    if (err instanceof JsonWebTokenError) {
      if (err.message === 'invalid signature') {
        return new TokenError(
          TokenErrorCode.SignatureInvalid,
          'Token signature is invalid',
        );
      }
      if (err.message === 'invalid algorithm') {
        return new TokenError(TokenErrorCode.WrongAlgorithm, err.message);
      }
      return new TokenError(TokenErrorCode.MalformedToken, err.message);
    }
    return err instanceof Error ? err : new Error(String(err));
  }
}
