import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import {
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  KeyObject,
} from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  issuerConfig,
  IssuerConfig,
} from '../../common/config/configuration';
import { KeyGenerationError } from './key-generation.error';

export const MIN_RSA_KEY_SIZE = 2048;

export interface KeyPair {
  privateKey: KeyObject;
  publicKey: KeyObject;
}

// fs errors can come from another realm (e.g. under Jest), so match by shape
function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err;
}

/**
 * Owns the RSA signing key pair. Keys are generated at startup, or loaded from
 * JWT_PRIVATE_KEY_FILE when it is set (and written there on first start).
 */
@Injectable()
export class KeyManagerService implements OnModuleInit {
  private readonly logger = new Logger(KeyManagerService.name);
  private keyPair?: KeyPair;
  private publicKeyPem?: string;

  constructor(
    @Inject(issuerConfig.KEY) private readonly config: IssuerConfig,
  ) {}

  async onModuleInit(): Promise<void> {
    const { keySize, privateKeyFile } = this.config.jwt;
    this.keyPair = privateKeyFile
      ? await this.loadOrCreate(privateKeyFile, keySize)
      : this.generateKeyPair(keySize);
    this.publicKeyPem = this.keyPair.publicKey
      .export({ type: 'spki', format: 'pem' })
      .toString();

    this.logger.log(
      `JWT signing keys ready (rsa, ${this.keyPair.privateKey.asymmetricKeyDetails?.modulusLength ?? keySize} bits)`,
    );
  }

  generateKeyPair(bitSize: number): KeyPair {
    if (!Number.isInteger(bitSize) || bitSize < MIN_RSA_KEY_SIZE) {
      throw new KeyGenerationError(
        `RSA key size must be at least ${MIN_RSA_KEY_SIZE} bits, got ${bitSize}`,
      );
    }

    try {
      return generateKeyPairSync('rsa', {
        modulusLength: bitSize,
        publicExponent: 0x10001,
      });
    } catch (err) {
      throw new KeyGenerationError(
        `Failed to generate RSA key pair: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  getKeyPair(): KeyPair {
    if (!this.keyPair) {
      throw new Error('JWT signing keys have not been initialized');
    }
    return this.keyPair;
  }

  /** Public half as an SPKI ("BEGIN PUBLIC KEY") PEM document. */
  exportPublicKeyPem(): string {
    if (!this.publicKeyPem) {
      throw new Error('JWT signing keys have not been initialized');
    }
    return this.publicKeyPem;
  }

  private async loadOrCreate(path: string, keySize: number): Promise<KeyPair> {
    let pem: string;
    try {
      pem = await readFile(path, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return this.createAndPersist(path, keySize);
      }
      throw new KeyGenerationError(
        `Failed to read private key file ${path}: ${isErrnoException(err) ? err.message : String(err)}`,
      );
    }

    const pair = this.fromPrivateKeyPem(pem, path);
    this.logger.log(`Loaded signing key from ${path}`);
    return pair;
  }

  private async createAndPersist(path: string, keySize: number): Promise<KeyPair> {
    const pair = this.generateKeyPair(keySize);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(
      path,
      pair.privateKey.export({ type: 'pkcs8', format: 'pem' }),
      { mode: 0o600 },
    );
    this.logger.log(`Generated new signing key and saved it to ${path}`);
    return pair;
  }

  private fromPrivateKeyPem(pem: string, path: string): KeyPair {
    let privateKey: KeyObject;
    try {
      privateKey = createPrivateKey({ key: pem, format: 'pem' });
    } catch (err) {
      throw new KeyGenerationError(
        `Private key file ${path} is not a valid PEM key: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const modulusLength = privateKey.asymmetricKeyDetails?.modulusLength ?? 0;
    if (privateKey.asymmetricKeyType !== 'rsa' || modulusLength < MIN_RSA_KEY_SIZE) {
      throw new KeyGenerationError(
        `Private key file ${path} must hold an RSA key of at least ${MIN_RSA_KEY_SIZE} bits`,
      );
    }

    return { privateKey, publicKey: createPublicKey(privateKey) };
  }
}
