import { generateKeyPairSync } from 'crypto';
import { buildGatewayConfig } from '../../../../test/gateway-config.fixture';
import { startStubServer, StubHandler, StubServer } from '../../../../test/http-stub';
import { KeyUnavailableError } from '../key-unavailable.error';
import { HttpPublicKeySource, parseRsaPublicKey } from '../public-key.source';

describe('HttpPublicKeySource', () => {
  let stub: StubServer;
  let handler: StubHandler;
  const rsaPem = generateKeyPairSync('rsa', { modulusLength: 2048 })
    .publicKey.export({ type: 'spki', format: 'pem' })
    .toString();

  beforeAll(async () => {
    stub = await startStubServer((req, res) => handler(req, res));
  });

  afterAll(async () => {
    await stub.close();
  });

  const respondJson =
    (status: number, body: unknown): StubHandler =>
    (_req, res) => {
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(body));
    };

  const source = (timeoutMs = 1000) =>
    new HttpPublicKeySource(
      buildGatewayConfig({
        issuer: {
          publicKeyUrl: `${stub.url}/api/v1/auth/public-key`,
          fetchTimeoutMs: timeoutMs,
        },
      }),
    );

  const reasonOf = async (attempt: Promise<unknown>) => {
    try {
      await attempt;
    } catch (err) {
      if (err instanceof KeyUnavailableError) return err.reason;
      throw err;
    }
    throw new Error('expected the fetch to fail');
  };

  it('should parse the RSA key from a well-formed response', async () => {
    handler = respondJson(200, {
      public_key: rsaPem,
      algorithm: 'RS256',
      key_type: 'RSA',
    });

    const key = await source().fetchPublicKey();

    expect(key.asymmetricKeyType).toBe('rsa');
    expect(key.export({ type: 'spki', format: 'pem' }).toString()).toBe(rsaPem);
  });

  it('should report a non-200 status', async () => {
    handler = respondJson(500, { error: 'boom' });

    expect(await reasonOf(source().fetchPublicKey())).toBe('http-status');
  });

  it('should report a body without public_key', async () => {
    handler = respondJson(200, { key: rsaPem });

    expect(await reasonOf(source().fetchPublicKey())).toBe('bad-response');
  });

  it('should report an unexpected algorithm', async () => {
    handler = respondJson(200, { public_key: rsaPem, algorithm: 'HS256' });

    expect(await reasonOf(source().fetchPublicKey())).toBe('bad-response');
  });

  it('should report a PEM that does not parse', async () => {
    handler = respondJson(200, { public_key: 'garbage', algorithm: 'RS256' });

    expect(await reasonOf(source().fetchPublicKey())).toBe('pem-parse');
  });

  it('should report a timeout when the issuer does not answer in time', async () => {
    handler = (_req, res) => {
      setTimeout(() => res.end(), 500);
    };

    expect(await reasonOf(source(50).fetchPublicKey())).toBe('timeout');
  });
});

describe('parseRsaPublicKey', () => {
  it('should refuse a non-RSA key', () => {
    const ecPem = generateKeyPairSync('ec', { namedCurve: 'P-256' })
      .publicKey.export({ type: 'spki', format: 'pem' })
      .toString();

    expect(() => parseRsaPublicKey(ecPem)).toThrow('Public key must be RSA, got ec');
  });
});
