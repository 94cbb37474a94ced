import { ConfigType, registerAs } from '@nestjs/config';
import { parseDurationSeconds } from '../../../../../libs/common/src';

export const issuerConfig = registerAs('issuer', () => {
  const nodeEnv = process.env.NODE_ENV || 'development';
  return {
    app: {
      nodeEnv,
      port: parseInt(process.env.PORT || '8080', 10),
      apiBasePath: process.env.API_BASE_PATH || '/api/v1',
    },
    jwt: {
      issuer: process.env.JWT_ISSUER || 'auth-service',
      accessTokenTtlSeconds: parseDurationSeconds(
        process.env.JWT_ACCESS_TOKEN_TTL || '30m',
      ),
      refreshTokenTtlSeconds: parseDurationSeconds(
        process.env.JWT_REFRESH_TOKEN_TTL || '7d',
      ),
      keySize: parseInt(process.env.JWT_KEY_SIZE || '2048', 10),
      privateKeyFile: process.env.JWT_PRIVATE_KEY_FILE || undefined,
    },
    users: {
      seedFile: process.env.USERS_SEED_FILE || undefined,
      bcryptRounds: parseInt(
        process.env.BCRYPT_ROUNDS || (nodeEnv === 'test' ? '4' : '12'),
        10,
      ),
    },
  };
});

export type IssuerConfig = ConfigType<typeof issuerConfig>;
