import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import axios, {
  AxiosHeaders,
  AxiosRequestConfig,
  AxiosResponse,
  isAxiosError,
} from 'axios';
import type { Response } from 'express';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  CircuitBreakerService,
  CircuitState,
  CORRELATION_ID_HEADER,
} from '../../../../../libs/common/src';
import {
  gatewayConfig,
  GatewayConfig,
} from '../../common/config/configuration';
import type { GatewayRequest } from '../auth/gateway-request.interface';
import { BackendRegistryService, BackendTarget } from './backend-registry.service';
import { buildOutboundHeaders, relayableResponseHeaders } from './proxy-headers';
import { BackendUnavailableError, InternalProxyError } from './proxy.errors';

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'ECONNABORTED',
  'ERR_SOCKET_CONNECTION_TIMEOUT',
]);

/** True for transport failures worth retrying; never for an HTTP response. */
export function isTransientTransportError(err: unknown): boolean {
  if (!isAxiosError(err) || err.response) return false;
  return TRANSIENT_ERROR_CODES.has(err.code ?? '');
}

/**
 * Joins the backend base URL with whatever followed `/<service>` in the
 * client's URL, query string included.
 */
export function buildTargetUrl(
  backend: BackendTarget,
  apiBasePath: string,
  originalUrl: string,
): URL {
  const prefix = `${apiBasePath}/${backend.name}`;
  if (!originalUrl.startsWith(prefix)) {
    throw new InternalProxyError(
      `Request path ${originalUrl} is not routed to ${backend.name}`,
    );
  }
  const remainder = originalUrl.slice(prefix.length);
  const suffix = remainder.startsWith('?') ? `/${remainder}` : remainder;

  try {
    return new URL(`${backend.baseUrl}${suffix || '/'}`);
  } catch (err) {
    throw new InternalProxyError(
      `Invalid target URL for ${backend.name}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

@Injectable()
export class ProxyForwarderService {
  private readonly logger = new Logger(ProxyForwarderService.name);
  private readonly breakers = new Map<string, CircuitBreakerService>();

  constructor(
    private readonly registry: BackendRegistryService,
    @Inject(gatewayConfig.KEY) private readonly config: GatewayConfig,
  ) {}

  /**
   * Sends the request to the named backend and streams its response back
   * unchanged. Rejects with BackendUnavailableError once retries are spent.
   */
  async forward(serviceName: string, req: GatewayRequest, res: Response): Promise<void> {
    const backend = this.registry.resolve(serviceName);
    if (!backend) {
      throw new NotFoundException(`Unknown service: ${serviceName}`);
    }

    const target = buildTargetUrl(backend, this.config.app.apiBasePath, req.originalUrl);
    const correlationId = req.headers[CORRELATION_ID_HEADER];
    const body: unknown = req.body;
    const request: AxiosRequestConfig = {
      url: target.toString(),
      method: req.method,
      headers: buildOutboundHeaders(req.headers, {
        clientIp: req.ip ?? req.socket.remoteAddress,
        host: req.headers.host,
        protocol: req.protocol,
        correlationId: typeof correlationId === 'string' ? correlationId : undefined,
        identity: req.identity,
      }),
      data: Buffer.isBuffer(body) && body.length > 0 ? body : undefined,
      timeout: this.config.proxy.timeoutMs,
      responseType: 'stream',
      validateStatus: () => true,
      maxRedirects: 0,
      decompress: false,
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    };

    const upstream = await this.breakerFor(backend.name).exec(
      () => this.sendWithRetry(backend.name, request),
      (reason) => Promise.reject(new BackendUnavailableError(backend.name, reason)),
    );

    res.status(upstream.status);
    const headers =
      upstream.headers instanceof AxiosHeaders ? upstream.headers.toJSON() : upstream.headers;
    for (const [name, value] of Object.entries(relayableResponseHeaders(headers))) {
      res.setHeader(name, value);
    }
    await pipeline(upstream.data, res);
  }

  /** Backends that were never called report `closed`. */
  circuitState(serviceName: string): CircuitState {
    return this.breakers.get(serviceName)?.getState() ?? 'closed';
  }

  private async sendWithRetry(
    serviceName: string,
    request: AxiosRequestConfig,
  ): Promise<AxiosResponse<Readable>> {
    const { maxRetries, retryDelayMs } = this.config.proxy;
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await axios.request<Readable>(request);
      } catch (err) {
        lastError = err;
        if (!isTransientTransportError(err)) break;
        if (attempt < maxRetries) {
          this.logger.warn(
            `Request to ${serviceName} failed (attempt ${attempt + 1}/${maxRetries + 1}), retrying in ${retryDelayMs}ms: ${err instanceof Error ? err.message : String(err)}`,
          );
          await new Promise((resolve) => setTimeout(resolve, retryDelayMs));
        }
      }
    }

    this.logger.error(
      `Service ${serviceName} is unavailable: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
    );
    throw lastError;
  }

  private breakerFor(serviceName: string): CircuitBreakerService {
    let breaker = this.breakers.get(serviceName);
    if (!breaker) {
      breaker = new CircuitBreakerService(`proxy:${serviceName}`, {
        failureThreshold: this.config.proxy.breaker.failureThreshold,
        cooldownMs: this.config.proxy.breaker.cooldownMs,
        successThreshold: 1,
      });
      this.breakers.set(serviceName, breaker);
    }
    return breaker;
  }
}
