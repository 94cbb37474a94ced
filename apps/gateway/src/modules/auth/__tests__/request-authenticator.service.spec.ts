import { Test, TestingModule } from '@nestjs/testing';
import { JwtService } from '@nestjs/jwt';
import { generateKeyPairSync, KeyObject } from 'crypto';
import {
  AppLoggerService,
  loggingConfig,
  RequestContextService,
  TokenCodecService,
  TokenErrorCode,
  TokenKind,
  TokenModule,
} from '../../../../../../libs/common/src';
import { AuthPolicy } from '../auth.types';
import { KeyUnavailableError } from '../key-unavailable.error';
import { PublicKeyCacheService } from '../public-key-cache.service';
import {
  parseBearerToken,
  RequestAuthenticatorService,
} from '../request-authenticator.service';

const alice = { subjectId: '42', email: 'alice@example.com', isAdmin: true };

describe('RequestAuthenticatorService', () => {
  let authenticator: RequestAuthenticatorService;
  let codec: TokenCodecService;
  let privateKey: KeyObject;
  let publicKey: KeyObject;
  let foreignPrivateKey: KeyObject;
  const getKey = jest.fn<Promise<KeyObject>, []>();

  beforeAll(() => {
    ({ privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 }));
    ({ privateKey: foreignPrivateKey } = generateKeyPairSync('rsa', {
      modulusLength: 2048,
    }));
  });

  beforeEach(async () => {
    getKey.mockReset();
    getKey.mockResolvedValue(publicKey);

    const module: TestingModule = await Test.createTestingModule({
      imports: [TokenModule],
      providers: [
        RequestAuthenticatorService,
        RequestContextService,
        AppLoggerService,
        { provide: PublicKeyCacheService, useValue: { getKey } },
        { provide: loggingConfig.KEY, useValue: { level: 'error' } },
      ],
    }).compile();

    authenticator = module.get<RequestAuthenticatorService>(RequestAuthenticatorService);
    codec = module.get<TokenCodecService>(TokenCodecService);
  });

  const sign = (kind: TokenKind, key: KeyObject = privateKey) =>
    codec.sign(alice, kind, key, { issuer: 'auth-service', ttlSeconds: 1800 });

  describe('authenticate', () => {
    it('should return the identity carried by a valid access token', async () => {
      const result = await authenticator.authenticate(
        `Bearer ${sign(TokenKind.Access)}`,
      );

      expect(result).toEqual({ ok: true, identity: alice });
    });

    it('should report a missing header without touching the key cache', async () => {
      const result = await authenticator.authenticate(undefined);

      expect(result).toEqual({ ok: false, failure: { kind: 'MissingCredentials' } });
      expect(getKey).not.toHaveBeenCalled();
    });

    it.each(['Basic dXNlcjpwdw==', 'Bearer', 'Bearer ', 'bearer abc.def.ghi', 'Token abc'])(
      'should treat %p as a malformed header',
      async (header) => {
        const result = await authenticator.authenticate(header);

        expect(result).toEqual({ ok: false, failure: { kind: 'MalformedHeader' } });
      },
    );

    it('should reject a refresh token', async () => {
      const result = await authenticator.authenticate(
        `Bearer ${sign(TokenKind.Refresh)}`,
      );

      expect(result).toEqual({ ok: false, failure: { kind: 'WrongTokenType' } });
    });

    it('should reject a token signed by another key', async () => {
      const result = await authenticator.authenticate(
        `Bearer ${sign(TokenKind.Access, foreignPrivateKey)}`,
      );

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'InvalidToken', code: TokenErrorCode.SignatureInvalid },
      });
    });

    it('should reject an expired token', async () => {
      const pastCodec = new TokenCodecService(new JwtService({}), {
        now: () => Date.now() - 2 * 3600 * 1000,
      });
      const expired = pastCodec.sign(alice, TokenKind.Access, privateKey, {
        issuer: 'auth-service',
        ttlSeconds: 3600,
      });

      const result = await authenticator.authenticate(`Bearer ${expired}`);

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'InvalidToken', code: TokenErrorCode.Expired },
      });
    });

    it('should report an unavailable key separately from token errors', async () => {
      getKey.mockRejectedValueOnce(new KeyUnavailableError('timeout', 'timed out'));

      const result = await authenticator.authenticate(
        `Bearer ${sign(TokenKind.Access)}`,
      );

      expect(result).toEqual({
        ok: false,
        failure: { kind: 'KeyUnavailable', reason: 'timeout' },
      });
    });
  });

  describe('applyPolicy', () => {
    it('should reject failures on required routes', async () => {
      const outcome = await authenticator.applyPolicy(AuthPolicy.Required, 'Token abc');

      expect(outcome).toEqual({
        action: 'reject',
        failure: { kind: 'MalformedHeader' },
      });
    });

    it('should continue anonymously on optional routes', async () => {
      const outcome = await authenticator.applyPolicy(
        AuthPolicy.Optional,
        `Bearer ${sign(TokenKind.Refresh)}`,
      );

      expect(outcome).toEqual({ action: 'continue', identity: undefined });
    });

    it('should attach the identity on optional routes when the token is valid', async () => {
      const outcome = await authenticator.applyPolicy(
        AuthPolicy.Optional,
        `Bearer ${sign(TokenKind.Access)}`,
      );

      expect(outcome).toEqual({ action: 'continue', identity: alice });
    });
  });
});

describe('parseBearerToken', () => {
  it('should keep everything after the first space as the token', () => {
    expect(parseBearerToken('Bearer abc def')).toBe('abc def');
  });
});
