import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { generateKeyPairSync, KeyObject } from 'crypto';
import { Server } from 'http';
import request from 'supertest';
import {
  TokenCodecService,
  TokenKind,
} from '../../../libs/common/src';
import { AppModule } from '../src/app.module';
import { configureGatewayApp } from '../src/bootstrap';
import { gatewayConfig, GatewayConfig } from '../src/common/config/configuration';
import { buildGatewayConfig } from './gateway-config.fixture';
import { closedPortUrl, readBody, startStubServer, StubServer } from './http-stub';

const alice = { subjectId: '42', email: 'alice@example.com', isAdmin: false };

interface EchoBody {
  method: string;
  url: string;
  headers: Record<string, string | undefined>;
  body: string;
}

async function createGateway(config: GatewayConfig): Promise<INestApplication> {
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(gatewayConfig.KEY)
    .useValue(config)
    .compile();

  const app = moduleFixture.createNestApplication({ bodyParser: false });
  configureGatewayApp(app);
  await app.init();
  return app;
}

describe('Gateway E2E Tests', () => {
  let privateKey: KeyObject;
  let publicKeyPem: string;
  let issuer: StubServer;
  let backend: StubServer;
  let downUrl: string;
  const keyRequests = jest.fn();
  const backendRequests = jest.fn();

  beforeAll(async () => {
    const pair = generateKeyPairSync('rsa', { modulusLength: 2048 });
    privateKey = pair.privateKey;
    publicKeyPem = pair.publicKey.export({ type: 'spki', format: 'pem' }).toString();

    issuer = await startStubServer((_req, res) => {
      keyRequests();
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(
        JSON.stringify({ public_key: publicKeyPem, algorithm: 'RS256', key_type: 'RSA' }),
      );
    });

    backend = await startStubServer((req, res) => {
      backendRequests();
      readBody(req)
        .then((body) => {
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(
            JSON.stringify({
              method: req.method,
              url: req.url,
              headers: req.headers,
              body: body.toString('utf8'),
            }),
          );
        })
        .catch(() => res.destroy());
    });

    downUrl = await closedPortUrl();
  });

  afterAll(async () => {
    await issuer.close();
    await backend.close();
  });

  beforeEach(() => {
    backendRequests.mockClear();
  });

  describe('with a reachable issuer', () => {
    let app: INestApplication;
    let server: Server;
    let codec: TokenCodecService;

    beforeAll(async () => {
      keyRequests.mockClear();
      app = await createGateway(
        buildGatewayConfig({
          issuer: { publicKeyUrl: `${issuer.url}/api/v1/auth/public-key` },
          proxy: {
            backends: {
              stats: backend.url,
              auth: `${backend.url}/api/v1/auth`,
              down: downUrl,
            },
          },
        }),
      );
      server = app.getHttpServer();
      codec = app.get<TokenCodecService>(TokenCodecService);
    });

    afterAll(async () => {
      await app.close();
    });

    const token = (kind: TokenKind, ttlSeconds = 1800) =>
      codec.sign(alice, kind, privateKey, { issuer: 'auth-service', ttlSeconds });

    it('should reject a request without credentials before reaching the backend', async () => {
      const response = await request(server).get('/api/v1/stats/summary').expect(401);

      expect(response.headers['www-authenticate']).toBe('Bearer');
      expect(response.body.message).toBe('Authorization header required');
      expect(backendRequests).not.toHaveBeenCalled();
    });

    it('should reject a malformed authorization header', async () => {
      const response = await request(server)
        .get('/api/v1/stats/summary')
        .set('Authorization', 'Token abc')
        .expect(401);

      expect(response.body.message).toBe(
        "Invalid authorization header format. Expected 'Bearer <token>'",
      );
    });

    it('should reject an expired access token', async () => {
      const response = await request(server)
        .get('/api/v1/stats/summary')
        .set('Authorization', `Bearer ${token(TokenKind.Access, -60)}`)
        .expect(401);

      expect(response.body.message).toBe('Invalid or expired token');
      expect(backendRequests).not.toHaveBeenCalled();
    });

    it('should reject a refresh token used as an access token', async () => {
      await request(server)
        .get('/api/v1/stats/summary')
        .set('Authorization', `Bearer ${token(TokenKind.Refresh)}`)
        .expect(401);

      expect(backendRequests).not.toHaveBeenCalled();
    });

    it('should forward a valid request with identity headers', async () => {
      const response = await request(server)
        .post('/api/v1/stats/events?source=e2e')
        .set('Authorization', `Bearer ${token(TokenKind.Access)}`)
        .set('X-User-Id', '1')
        .set('Content-Type', 'text/plain')
        .send('hello')
        .expect(200);

      const body = response.body as EchoBody;
      expect(body.method).toBe('POST');
      expect(body.url).toBe('/events?source=e2e');
      expect(body.body).toBe('hello');
      expect(body.headers['x-user-id']).toBe('42');
      expect(body.headers['x-user-email']).toBe('alice@example.com');
      expect(body.headers['x-user-is-admin']).toBe('false');
      expect(body.headers['x-correlation-id']).toBe(response.headers['x-correlation-id']);
    });

    it('should fetch the public key only once across requests', async () => {
      for (let i = 0; i < 3; i++) {
        await request(server)
          .get('/api/v1/stats/summary')
          .set('Authorization', `Bearer ${token(TokenKind.Access)}`)
          .expect(200);
      }

      expect(keyRequests).toHaveBeenCalledTimes(1);
    });

    it('should forward optional-auth routes without a token', async () => {
      const response = await request(server)
        .post('/api/v1/auth/login')
        .send({ email: 'alice@example.com', password: 'test-password' })
        .expect(200);

      const body = response.body as EchoBody;
      expect(body.url).toBe('/api/v1/auth/login');
      expect(body.headers['x-user-id']).toBeUndefined();
      expect(JSON.parse(body.body)).toEqual({
        email: 'alice@example.com',
        password: 'test-password',
      });
    });

    it('should answer 404 for an unknown service', async () => {
      const response = await request(server)
        .get('/api/v1/missing/anything')
        .set('Authorization', `Bearer ${token(TokenKind.Access)}`)
        .expect(404);

      expect(response.body.message).toBe('Unknown service: missing');
    });

    it('should answer 502 when the backend is offline', async () => {
      const response = await request(server)
        .get('/api/v1/down/status')
        .set('Authorization', `Bearer ${token(TokenKind.Access)}`)
        .expect(502);

      expect(response.body.error).toBe('Bad Gateway');
      expect(response.body.message).toBe('Service down is unavailable');
    });

    it('should report health with the key cache state', async () => {
      const response = await request(server).get('/health').expect(200);

      expect(response.body.status).toBe('healthy');
      expect(response.body.service).toBe('gateway');
      expect(response.body.public_key.state).toBe('cached');
      expect(response.body.backends).toEqual([
        { name: 'stats', circuit: 'closed' },
        { name: 'auth', circuit: 'closed' },
        { name: 'down', circuit: 'closed' },
      ]);
      expect(response.headers['server']).toBe('gateway-service');
    });
  });

  describe('with an unreachable issuer', () => {
    let app: INestApplication;
    let server: Server;

    beforeAll(async () => {
      app = await createGateway(
        buildGatewayConfig({
          issuer: { publicKeyUrl: `${downUrl}/api/v1/auth/public-key` },
          proxy: { backends: { stats: backend.url } },
        }),
      );
      server = app.getHttpServer();
    });

    afterAll(async () => {
      await app.close();
    });

    it('should fail closed with 503 and never reach the backend', async () => {
      const codec = app.get<TokenCodecService>(TokenCodecService);
      const accessToken = codec.sign(alice, TokenKind.Access, privateKey, {
        issuer: 'auth-service',
        ttlSeconds: 1800,
      });

      const response = await request(server)
        .get('/api/v1/stats/summary')
        .set('Authorization', `Bearer ${accessToken}`)
        .expect(503);

      expect(response.body.message).toBe('Authentication is temporarily unavailable');
      expect(backendRequests).not.toHaveBeenCalled();
    });
  });
});
