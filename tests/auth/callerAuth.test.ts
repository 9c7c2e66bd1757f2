import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import express from 'express';
import request from 'supertest';
import { ethers } from 'ethers';
import {
  AUTH_HEADERS,
  buildAuthMessage,
  createCallerAuth,
  getCaller,
  type CallerAuthConfig,
} from '../../src/auth/callerAuth.js';
import { MemoryReplayGuard } from '../../src/auth/replayGuard.js';
import { T0 } from '../helpers/fixtures.js';

function echoApp(config: CallerAuthConfig) {
  const app = express();
  app.use(express.json());
  app.post('/echo', createCallerAuth(config), (_req, res) => {
    res.json({ caller: getCaller(res) });
  });
  return app;
}

const signatureConfig: CallerAuthConfig = { mode: 'signature', maxSkewSeconds: 300, clock: () => T0 };

// ─── Auth message ──────────────────────────────────────────────────────────

describe('buildAuthMessage', () => {
  it('binds method, path, timestamp and body hash', () => {
    const bodyHash = createHash('sha256').update('{"name":"Alice"}').digest('hex');
    expect(buildAuthMessage('post', '/api/v1/identities', T0, { name: 'Alice' })).toBe(
      `identity-registry:POST:/api/v1/identities:${T0}:${bodyHash}`,
    );
  });

  it('hashes a missing body as an empty object', () => {
    expect(buildAuthMessage('GET', '/x', T0, undefined)).toBe(buildAuthMessage('GET', '/x', T0, {}));
  });
});

// ─── Signature mode ────────────────────────────────────────────────────────

describe('createCallerAuth (signature mode)', () => {
  const wallet = ethers.Wallet.createRandom();
  const other = ethers.Wallet.createRandom();
  const body = { hello: 'world' };

  async function signedHeaders(signer: ethers.HDNodeWallet, timestamp: number, signedBody: unknown = body) {
    const signature = await signer.signMessage(buildAuthMessage('POST', '/echo', timestamp, signedBody));
    return {
      [AUTH_HEADERS.address]: wallet.address,
      [AUTH_HEADERS.timestamp]: String(timestamp),
      [AUTH_HEADERS.signature]: signature,
    };
  }

  it('accepts a request signed by the claimed address', async () => {
    const res = await request(echoApp(signatureConfig))
      .post('/echo')
      .set(await signedHeaders(wallet, T0))
      .send(body);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ caller: wallet.address });
  });

  it('accepts a timestamp at the edge of the window', async () => {
    const res = await request(echoApp(signatureConfig))
      .post('/echo')
      .set(await signedHeaders(wallet, T0 - 300))
      .send(body);

    expect(res.status).toBe(200);
  });

  it('rejects the same signed request sent twice', async () => {
    const app = echoApp(signatureConfig);
    const headers = await signedHeaders(wallet, T0);

    const first = await request(app).post('/echo').set(headers).send(body);
    const second = await request(app).post('/echo').set(headers).send(body);

    expect(first.status).toBe(200);
    expect(second.status).toBe(401);
    expect(second.body).toEqual({ error: 'unauthorized', message: 'Request already used' });
  });

  it('accepts a fresh signature over the same body', async () => {
    const app = echoApp(signatureConfig);

    const first = await request(app).post('/echo').set(await signedHeaders(wallet, T0)).send(body);
    const second = await request(app).post('/echo').set(await signedHeaders(wallet, T0 - 1)).send(body);

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
  });

  it('shares accepted requests through the configured guard', async () => {
    const replayGuard = new MemoryReplayGuard(() => T0);
    const headers = await signedHeaders(wallet, T0);

    const first = await request(echoApp({ ...signatureConfig, replayGuard })).post('/echo').set(headers).send(body);
    const second = await request(echoApp({ ...signatureConfig, replayGuard })).post('/echo').set(headers).send(body);

    expect(first.status).toBe(200);
    expect(second.body.message).toBe('Request already used');
    expect(replayGuard.size).toBe(1);
  });

  it('does not remember rejected requests', async () => {
    const replayGuard = new MemoryReplayGuard(() => T0);
    await request(echoApp({ ...signatureConfig, replayGuard }))
      .post('/echo')
      .set(await signedHeaders(other, T0))
      .send(body);

    expect(replayGuard.size).toBe(0);
  });

  it('rejects a stale timestamp', async () => {
    const res = await request(echoApp(signatureConfig))
      .post('/echo')
      .set(await signedHeaders(wallet, T0 - 301))
      .send(body);

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'unauthorized', message: 'Request timestamp outside the accepted window' });
  });

  it('rejects a signature from another key', async () => {
    const res = await request(echoApp(signatureConfig))
      .post('/echo')
      .set(await signedHeaders(other, T0))
      .send(body);

    expect(res.status).toBe(401);
    expect(res.body.message).toBe('Signature does not match address');
  });

  it('rejects a body that differs from the signed one', async () => {
    const res = await request(echoApp(signatureConfig))
      .post('/echo')
      .set(await signedHeaders(wallet, T0, { hello: 'someone else' }))
      .send(body);

    expect(res.status).toBe(401);
    expect(res.body.message).toBe('Signature does not match address');
  });

  it('rejects missing headers', async () => {
    const res = await request(echoApp(signatureConfig)).post('/echo').send(body);

    expect(res.status).toBe(401);
    expect(res.body.message).toMatch(/^Missing authentication headers/);
  });

  it('rejects a malformed signature', async () => {
    const res = await request(echoApp(signatureConfig))
      .post('/echo')
      .set({
        [AUTH_HEADERS.address]: wallet.address,
        [AUTH_HEADERS.timestamp]: String(T0),
        [AUTH_HEADERS.signature]: '0x1234',
      })
      .send(body);

    expect(res.status).toBe(401);
    expect(res.body.message).toMatch(/^Malformed signature/);
  });

  it('rejects a non-numeric timestamp', async () => {
    const res = await request(echoApp(signatureConfig))
      .post('/echo')
      .set({
        [AUTH_HEADERS.address]: wallet.address,
        [AUTH_HEADERS.timestamp]: 'yesterday',
        [AUTH_HEADERS.signature]: '0x1234',
      })
      .send(body);

    expect(res.status).toBe(401);
    expect(res.body.message).toBe('Invalid x-registry-timestamp header');
  });
});

// ─── Header mode ───────────────────────────────────────────────────────────

describe('createCallerAuth (header mode)', () => {
  const app = echoApp({ mode: 'header', maxSkewSeconds: 300 });
  const wallet = ethers.Wallet.createRandom();

  it('takes the caller from the header in checksum form', async () => {
    const res = await request(app)
      .post('/echo')
      .set(AUTH_HEADERS.caller, wallet.address.toLowerCase())
      .send({});

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ caller: wallet.address });
  });

  it('rejects a missing or invalid caller header', async () => {
    const missing = await request(app).post('/echo').send({});
    const invalid = await request(app).post('/echo').set(AUTH_HEADERS.caller, 'alice').send({});

    expect(missing.status).toBe(401);
    expect(invalid.body).toEqual({ error: 'unauthorized', message: 'Missing or invalid x-registry-caller header' });
  });
});
