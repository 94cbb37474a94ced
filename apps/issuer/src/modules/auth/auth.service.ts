import {
  Inject,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import * as bcrypt from 'bcryptjs';
import { randomUUID } from 'crypto';
import {
  AppLoggerService,
  AuthenticatedIdentity,
  TokenClaims,
  TokenCodecService,
  TokenError,
  TokenKind,
  TokenPair,
} from '../../../../../libs/common/src';
import {
  issuerConfig,
  IssuerConfig,
} from '../../common/config/configuration';
import { KeyManagerService } from '../keys/key-manager.service';
import { User } from '../users/interfaces/user.interface';
import { UsersRepository } from '../users/users.repository';
import {
  TOKEN_REVOCATION_STORE,
  TokenRevocationStore,
} from './revocation/token-revocation.store';

export const INVALID_CREDENTIALS = 'Invalid credentials';
export const INVALID_REFRESH_TOKEN = 'Invalid or expired refresh token';

type CredentialCheck =
  | { ok: true; user: User }
  | { ok: false; reason: 'UserNotFound' | 'InvalidPassword' };

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private dummyHash?: Promise<string>;

  constructor(
    private readonly users: UsersRepository,
    private readonly tokenCodec: TokenCodecService,
    private readonly keyManager: KeyManagerService,
    @Inject(TOKEN_REVOCATION_STORE)
    private readonly revocationStore: TokenRevocationStore,
    @Inject(issuerConfig.KEY) private readonly config: IssuerConfig,
    private readonly appLogger: AppLoggerService,
  ) {}

  /**
   * Exchanges email and password for a token pair. Unknown users and wrong
   * passwords fail identically so callers cannot probe for accounts.
   */
  async login(email: string, password: string): Promise<TokenPair> {
    const check = await this.checkCredentials(email, password);
    if (!check.ok) {
      this.appLogger.logSecurity(`Login failed: ${check.reason}`, { email });
      throw new UnauthorizedException(INVALID_CREDENTIALS);
    }

    const pair = this.issueTokenPair(check.user);
    this.logger.log(`User logged in successfully: ${check.user.email}`);
    return pair;
  }

  /**
   * Mints a fresh pair from a valid refresh token. The subject must still
   * exist, and the new pair carries its current email and admin flag.
   */
  async refresh(refreshToken: string): Promise<TokenPair> {
    let claims: TokenClaims;
    try {
      claims = this.tokenCodec.verify(
        refreshToken,
        this.keyManager.getKeyPair().publicKey,
      );
    } catch (err) {
      if (err instanceof TokenError) {
        this.appLogger.logSecurity(`Refresh rejected: ${err.code}`);
        throw new UnauthorizedException(INVALID_REFRESH_TOKEN);
      }
      throw err;
    }

    if (claims.tokenKind !== TokenKind.Refresh) {
      this.appLogger.logSecurity('Refresh rejected: InvalidTokenType', {
        subjectId: claims.subjectId,
      });
      throw new UnauthorizedException(INVALID_REFRESH_TOKEN);
    }

    if (await this.revocationStore.isRevoked(refreshToken, claims)) {
      this.appLogger.logSecurity('Refresh rejected: Revoked', {
        subjectId: claims.subjectId,
      });
      throw new UnauthorizedException(INVALID_REFRESH_TOKEN);
    }

    const user = await this.users.findById(claims.subjectId);
    if (!user) {
      this.appLogger.logSecurity('Refresh rejected: UserNotFound', {
        subjectId: claims.subjectId,
      });
      throw new UnauthorizedException(INVALID_REFRESH_TOKEN);
    }

    return this.issueTokenPair(user);
  }

  async logout(
    identity: AuthenticatedIdentity,
    refreshToken: string,
  ): Promise<{ revoked: boolean }> {
    const revoked = await this.revocationStore.revoke(refreshToken, identity);
    this.logger.log(
      `User ${identity.subjectId} logged out (refresh token revoked: ${revoked})`,
    );
    return { revoked };
  }

  private async checkCredentials(
    email: string,
    password: string,
  ): Promise<CredentialCheck> {
    const user = await this.users.findByEmail(email);
    if (!user) {
      // keep response time close to the wrong-password path
      await bcrypt.compare(password, await this.getDummyHash());
      return { ok: false, reason: 'UserNotFound' };
    }

    const isPasswordValid = await bcrypt.compare(password, user.passwordHash);
    if (!isPasswordValid) {
      return { ok: false, reason: 'InvalidPassword' };
    }
    return { ok: true, user };
  }

  private getDummyHash(): Promise<string> {
    this.dummyHash ??= bcrypt.hash(randomUUID(), this.config.users.bcryptRounds);
    return this.dummyHash;
  }

  private issueTokenPair(user: Pick<User, 'id' | 'email' | 'isAdmin'>): TokenPair {
    const { privateKey } = this.keyManager.getKeyPair();
    const { issuer, accessTokenTtlSeconds, refreshTokenTtlSeconds } =
      this.config.jwt;
    const subject = {
      subjectId: user.id,
      email: user.email,
      isAdmin: user.isAdmin,
    };

    return {
      accessToken: this.tokenCodec.sign(subject, TokenKind.Access, privateKey, {
        issuer,
        ttlSeconds: accessTokenTtlSeconds,
      }),
      refreshToken: this.tokenCodec.sign(subject, TokenKind.Refresh, privateKey, {
        issuer,
        ttlSeconds: refreshTokenTtlSeconds,
      }),
      expiresIn: accessTokenTtlSeconds,
    };
  }
}
