import type { GatewayConfig } from '../src/common/config/configuration';

interface GatewayConfigOverrides {
  issuer?: Partial<GatewayConfig['issuer']>;
  auth?: Partial<GatewayConfig['auth']>;
  proxy?: Partial<GatewayConfig['proxy']>;
}

export function buildGatewayConfig(
  overrides: GatewayConfigOverrides = {},
): GatewayConfig {
  return {
    app: { nodeEnv: 'test', port: 0, apiBasePath: '/api/v1' },
    issuer: {
      publicKeyUrl: 'http://127.0.0.1:1/api/v1/auth/public-key',
      fetchTimeoutMs: 1000,
      cacheTtlMs: 3600 * 1000,
      ...overrides.issuer,
    },
    auth: {
      keyUnavailableStatus: 503,
      optionalPaths: ['/api/v1/auth/login', '/api/v1/auth/refresh', '/api/v1/auth/public-key'],
      ...overrides.auth,
    },
    proxy: {
      backends: {},
      timeoutMs: 5000,
      maxRetries: 0,
      retryDelayMs: 1,
      maxBodySize: '1mb',
      breaker: { failureThreshold: 5, cooldownMs: 30_000 },
      ...overrides.proxy,
    },
  };
}
