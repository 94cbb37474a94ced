import { ConfigType, registerAs } from '@nestjs/config';
import { parseDuration } from '../../../../../libs/common/src';

export type KeyUnavailableStatus = 401 | 503;

const DEFAULT_BACKENDS =
  'auth=http://auth-service:8080/api/v1/auth,stats=http://stats:8080,camera=http://camera:8080';

const DEFAULT_OPTIONAL_AUTH_PATHS =
  '/api/v1/auth/login,/api/v1/auth/refresh,/api/v1/auth/public-key';

function parseList(raw: string): string[] {
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseKeyUnavailableStatus(raw: string | undefined): KeyUnavailableStatus {
  return raw === '401' ? 401 : 503;
}

/**
 * Parses `name=url` pairs. `<NAME>_SERVICE_URL` overrides the url of a
 * listed backend, e.g. STATS_SERVICE_URL for `stats`.
 */
export function parseBackends(
  raw: string,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const backends: Record<string, string> = {};
  for (const entry of parseList(raw)) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      throw new Error(`Invalid GATEWAY_BACKENDS entry "${entry}", expected name=url`);
    }
    const name = entry.slice(0, separator).trim();
    const envKey = `${name.toUpperCase().replace(/-/g, '_')}_SERVICE_URL`;
    backends[name] = env[envKey] || entry.slice(separator + 1).trim();
  }
  return backends;
}

export const gatewayConfig = registerAs('gateway', () => ({
  app: {
    nodeEnv: process.env.NODE_ENV || 'development',
    port: parseInt(process.env.PORT || '8080', 10),
    apiBasePath: process.env.API_BASE_PATH || '/api/v1',
  },
  issuer: {
    publicKeyUrl:
      process.env.ISSUER_PUBLIC_KEY_URL ||
      'http://auth-service:8080/api/v1/auth/public-key',
    fetchTimeoutMs: parseDuration(process.env.PUBLIC_KEY_FETCH_TIMEOUT || '5s'),
    cacheTtlMs: parseDuration(process.env.PUBLIC_KEY_CACHE_TTL || '1h'),
  },
  auth: {
    keyUnavailableStatus: parseKeyUnavailableStatus(
      process.env.KEY_UNAVAILABLE_STATUS,
    ),
    optionalPaths: parseList(
      process.env.OPTIONAL_AUTH_PATHS ?? DEFAULT_OPTIONAL_AUTH_PATHS,
    ),
  },
  proxy: {
    backends: parseBackends(process.env.GATEWAY_BACKENDS || DEFAULT_BACKENDS),
    timeoutMs: parseDuration(process.env.PROXY_TIMEOUT || '30s'),
    maxRetries: parseInt(process.env.PROXY_MAX_RETRIES || '3', 10),
    retryDelayMs: parseDuration(process.env.PROXY_RETRY_DELAY || '2s'),
    maxBodySize: process.env.MAX_BODY_SIZE || '10mb',
    breaker: {
      failureThreshold: parseInt(
        process.env.PROXY_BREAKER_FAILURE_THRESHOLD || '5',
        10,
      ),
      cooldownMs: parseDuration(process.env.PROXY_BREAKER_COOLDOWN || '30s'),
    },
  },
}));

export type GatewayConfig = ConfigType<typeof gatewayConfig>;
