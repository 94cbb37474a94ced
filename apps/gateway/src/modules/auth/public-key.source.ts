import { Inject, Injectable } from '@nestjs/common';
import axios, { AxiosResponse, isAxiosError } from 'axios';
import { createPublicKey, KeyObject } from 'crypto';
import { SIGNING_ALGORITHM } from '../../../../../libs/common/src';
import {
  gatewayConfig,
  GatewayConfig,
} from '../../common/config/configuration';
import { KeyUnavailableError } from './key-unavailable.error';

export const PUBLIC_KEY_SOURCE = Symbol('PUBLIC_KEY_SOURCE');

export interface PublicKeySource {
  fetchPublicKey(): Promise<KeyObject>;
}

interface PublicKeyResponse {
  public_key: string;
  algorithm?: string;
  key_type?: string;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function isPublicKeyResponse(value: unknown): value is PublicKeyResponse {
  if (typeof value !== 'object' || value === null) return false;
  const body: Record<string, unknown> = { ...value };
  return (
    typeof body.public_key === 'string' &&
    (body.algorithm === undefined || typeof body.algorithm === 'string') &&
    (body.key_type === undefined || typeof body.key_type === 'string')
  );
}

/** Parses a PEM public key and insists on RSA. */
export function parseRsaPublicKey(pem: string): KeyObject {
  let key: KeyObject;
  try {
    key = createPublicKey({ key: pem, format: 'pem' });
  } catch (err) {
    throw new KeyUnavailableError(
      'pem-parse',
      `Public key is not valid PEM: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (key.asymmetricKeyType !== 'rsa') {
    throw new KeyUnavailableError(
      'not-rsa',
      `Public key must be RSA, got ${key.asymmetricKeyType ?? 'unknown'}`,
    );
  }
  return key;
}

/** Fetches the verification key from the issuer's public-key endpoint. */
@Injectable()
export class HttpPublicKeySource implements PublicKeySource {
  constructor(
    @Inject(gatewayConfig.KEY) private readonly config: GatewayConfig,
  ) {}

  async fetchPublicKey(): Promise<KeyObject> {
    const { publicKeyUrl, fetchTimeoutMs } = this.config.issuer;

    let response: AxiosResponse<unknown>;
    try {
      response = await axios.get<unknown>(publicKeyUrl, {
        timeout: fetchTimeoutMs,
        validateStatus: () => true,
        headers: { Accept: 'application/json' },
      });
    } catch (err) {
      const timedOut = isAxiosError(err) && TIMEOUT_CODES.has(err.code ?? '');
      throw new KeyUnavailableError(
        timedOut ? 'timeout' : 'network',
        `Failed to fetch public key from ${publicKeyUrl}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    if (response.status !== 200) {
      throw new KeyUnavailableError(
        'http-status',
        `Public key endpoint ${publicKeyUrl} returned HTTP ${response.status}`,
      );
    }

    const body = response.data;
    if (!isPublicKeyResponse(body)) {
      throw new KeyUnavailableError(
        'bad-response',
        `Public key endpoint ${publicKeyUrl} returned an unexpected body`,
      );
    }
    if (body.key_type !== undefined && body.key_type !== 'RSA') {
      throw new KeyUnavailableError('not-rsa', `Unsupported key type: ${body.key_type}`);
    }
    if (body.algorithm !== undefined && body.algorithm !== SIGNING_ALGORITHM) {
      throw new KeyUnavailableError(
        'bad-response',
        `Unsupported signing algorithm: ${body.algorithm}`,
      );
    }

    return parseRsaPublicKey(body.public_key);
  }
}
