import type { IssuerConfig } from '../src/common/config/configuration';

export function buildIssuerConfig(
  overrides: { jwt?: Partial<IssuerConfig['jwt']> } = {},
): IssuerConfig {
  return {
    app: { nodeEnv: 'test', port: 0, apiBasePath: '/api/v1' },
    jwt: {
      issuer: 'auth-service',
      accessTokenTtlSeconds: 1800,
      refreshTokenTtlSeconds: 7 * 24 * 3600,
      keySize: 2048,
      privateKeyFile: undefined,
      ...overrides.jwt,
    },
    users: { seedFile: undefined, bcryptRounds: 4 },
  };
}
