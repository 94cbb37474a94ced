import { Inject, Injectable, Logger } from '@nestjs/common';
import type { KeyObject } from 'crypto';
import { CLOCK, Clock } from '../../../../../libs/common/src';
import {
  gatewayConfig,
  GatewayConfig,
} from '../../common/config/configuration';
import { PUBLIC_KEY_SOURCE, PublicKeySource } from './public-key.source';

interface CachedPublicKey {
  key: KeyObject;
  fetchedAt: number;
  expiresAt: number;
}

export interface PublicKeyCacheSnapshot {
  state: 'empty' | 'cached' | 'stale';
  fetchedAt: string | null;
  expiresAt: string | null;
}

/**
 * Holds the issuer's public key for PUBLIC_KEY_CACHE_TTL.
 *
 * A fresh key is returned without waiting on anything. Callers that find the
 * cache empty or expired share one in-flight fetch. A failed fetch leaves the
 * cache untouched and an expired key is never handed out.
 */
@Injectable()
export class PublicKeyCacheService {
  private readonly logger = new Logger(PublicKeyCacheService.name);
  private cached: CachedPublicKey | null = null;
  private inflight: Promise<KeyObject> | null = null;

  constructor(
    @Inject(PUBLIC_KEY_SOURCE) private readonly source: PublicKeySource,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(gatewayConfig.KEY) private readonly config: GatewayConfig,
  ) {}

  getKey(): Promise<KeyObject> {
    const cached = this.cached;
    if (cached && this.clock.now() < cached.expiresAt) {
      return Promise.resolve(cached.key);
    }

    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  invalidate(): void {
    this.cached = null;
  }

  snapshot(): PublicKeyCacheSnapshot {
    const cached = this.cached;
    if (!cached) {
      return { state: 'empty', fetchedAt: null, expiresAt: null };
    }
    return {
      state: this.clock.now() < cached.expiresAt ? 'cached' : 'stale',
      fetchedAt: new Date(cached.fetchedAt).toISOString(),
      expiresAt: new Date(cached.expiresAt).toISOString(),
    };
  }

  private async refresh(): Promise<KeyObject> {
    let key: KeyObject;
    try {
      key = await this.source.fetchPublicKey();
    } catch (err) {
      this.logger.error(
        `Public key refresh failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      throw err;
    }

    const fetchedAt = this.clock.now();
    this.cached = {
      key,
      fetchedAt,
      expiresAt: fetchedAt + this.config.issuer.cacheTtlMs,
    };
    this.logger.log(
      `Public key refreshed; cached until ${new Date(this.cached.expiresAt).toISOString()}`,
    );
    return key;
  }
}
