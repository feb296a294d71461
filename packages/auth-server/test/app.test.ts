import { expect } from 'chai';
import { Server } from 'http';
import {
  CpAuthProtocolError,
  InMemoryAuditLogger,
  RFC5114_1024_160,
  bigIntToHex,
  createCommitment,
  createProofCommitment,
  createResponse,
  hexToBoundedInteger,
  randomBelow,
  readStringField,
} from '@cp-auth/core';
import { AuthClient, AuthCoordinator } from '@cp-auth/sdk';
import { createApp, statusForKind } from '../src/app';

const params = RFC5114_1024_160;

interface RunningServer {
  server: Server;
  baseUrl: string;
  coordinator: AuthCoordinator;
}

async function startServer(apiRateLimit = 1000): Promise<RunningServer> {
  const coordinator = new AuthCoordinator({ params, auditLogger: new InMemoryAuditLogger() });
  const app = createApp({
    coordinator,
    groupName: 'rfc5114-1024-160',
    apiRateLimit,
    nodeEnv: 'test',
    logRequests: false,
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}`, coordinator };
}

async function stopServer({ server, coordinator }: RunningServer): Promise<void> {
  coordinator.dispose();
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function postJson(baseUrl: string, path: string, body: unknown) {
  const res = await fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  const json: unknown = await res.json();
  return { status: res.status, body: json };
}

describe('auth-server', () => {
  let running: RunningServer;

  beforeEach(async () => {
    running = await startServer();
  });

  afterEach(async () => {
    await stopServer(running);
  });

  it('returns health status', async () => {
    const res = await fetch(`${running.baseUrl}/health`);
    expect(res.status).to.equal(200);
    const body: unknown = await res.json();
    expect(body).to.include({ status: 'healthy', group: 'rfc5114-1024-160' });
  });

  it('authenticates a registered user end to end', async () => {
    const client = new AuthClient({ baseUrl: running.baseUrl, params });
    const x = randomBelow(params.q);

    await client.register('alice', x);
    const sessionId = await client.login('alice', x);

    const session = await client.getSession(sessionId);
    expect(session?.user).to.equal('alice');
    const resolved = await running.coordinator.resolveSession(sessionId);
    expect(resolved?.identity).to.equal('alice');
  });

  it('rejects a proof made with the wrong secret', async () => {
    const client = new AuthClient({ baseUrl: running.baseUrl, params });
    const x = randomBelow(params.q);
    await client.register('alice', x);

    let caught: unknown;
    try {
      await client.login('alice', (x + 1n) % params.q);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(CpAuthProtocolError);
    if (caught instanceof CpAuthProtocolError) {
      expect(caught.kind).to.equal('INVALID_PROOF');
      expect(caught.message).to.equal('Proof verification failed.');
    }
  });

  it('answers 401 for a bad proof and 404 once the token is spent', async () => {
    const x = randomBelow(params.q);
    const { y1, y2 } = createCommitment(params, x);
    await postJson(running.baseUrl, '/register', {
      user: 'bob',
      y1: bigIntToHex(y1),
      y2: bigIntToHex(y2),
    });

    const { k, r1, r2 } = createProofCommitment(params);
    const challenge = await postJson(running.baseUrl, '/challenge', {
      user: 'bob',
      r1: bigIntToHex(r1),
      r2: bigIntToHex(r2),
    });
    expect(challenge.status).to.equal(200);
    const authId = readStringField(challenge.body, 'authId') ?? '';
    const c = hexToBoundedInteger(readStringField(challenge.body, 'c') ?? '', params.q, 'c');

    const wrong = (createResponse(params, k, c, x) + 1n) % params.q;
    const rejected = await postJson(running.baseUrl, '/verify', { authId, s: bigIntToHex(wrong) });
    expect(rejected).to.deep.equal({
      status: 401,
      body: { error: 'Unauthorized', code: 'INVALID_PROOF', message: 'Proof verification failed.' },
    });

    const replay = await postJson(running.baseUrl, '/verify', {
      authId,
      s: bigIntToHex(createResponse(params, k, c, x)),
    });
    expect(replay).to.deep.equal({
      status: 404,
      body: { error: 'Not found', code: 'NOT_FOUND', message: `Auth ID: ${authId} not found.` },
    });
  });

  it('answers 404 when challenging an unknown user', async () => {
    const result = await postJson(running.baseUrl, '/challenge', {
      user: 'ghost',
      r1: '02',
      r2: '03',
    });
    expect(result).to.deep.equal({
      status: 404,
      body: { error: 'Not found', code: 'NOT_FOUND', message: 'User: ghost not found.' },
    });
  });

  it('answers 400 for a missing field', async () => {
    const result = await postJson(running.baseUrl, '/register', { y1: '02', y2: '03' });
    expect(result).to.deep.equal({
      status: 400,
      body: {
        error: 'Invalid request',
        code: 'INVALID_ARGUMENT',
        message: 'user is required and must be a string',
      },
    });
  });

  it('answers 400 for a malformed hex string', async () => {
    const result = await postJson(running.baseUrl, '/register', {
      user: 'alice',
      y1: 'abc',
      y2: '03',
    });
    expect(result.status).to.equal(400);
    expect(result.body).to.deep.equal({
      error: 'Invalid request',
      code: 'INVALID_ARGUMENT',
      message: 'y1 must be a non-empty, even-length hex string',
    });
  });

  it('answers 400 for a group element outside [0, p)', async () => {
    const result = await postJson(running.baseUrl, '/register', {
      user: 'alice',
      y1: bigIntToHex(params.p),
      y2: '03',
    });
    expect(result.status).to.equal(400);
    expect(result.body).to.deep.equal({
      error: 'Invalid request',
      code: 'INVALID_ARGUMENT',
      message: 'y1 is out of range',
    });
  });

  it('answers 400 for an empty identity', async () => {
    const result = await postJson(running.baseUrl, '/register', {
      user: '',
      y1: '02',
      y2: '03',
    });
    expect(result.status).to.equal(400);
    expect(result.body).to.deep.equal({
      error: 'Invalid request',
      code: 'INVALID_ARGUMENT',
      message: 'user must be a non-empty string',
    });
  });

  it('answers 400 for a malformed JSON body', async () => {
    const res = await fetch(`${running.baseUrl}/register`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"user":',
    });
    expect(res.status).to.equal(400);
    const body: unknown = await res.json();
    expect(body).to.deep.equal({
      error: 'Invalid request',
      code: 'INVALID_ARGUMENT',
      message: 'Malformed JSON body',
    });
  });

  it('answers 404 for an unknown session and 400 for a malformed id', async () => {
    const unknown = await fetch(`${running.baseUrl}/session/unknown-session-id`);
    expect(unknown.status).to.equal(404);
    const unknownBody: unknown = await unknown.json();
    expect(unknownBody).to.deep.equal({
      error: 'Not found',
      code: 'NOT_FOUND',
      message: 'Session: unknown-session-id not found.',
    });

    const malformed = await fetch(`${running.baseUrl}/session/short`);
    expect(malformed.status).to.equal(400);
    const malformedBody: unknown = await malformed.json();
    expect(malformedBody).to.deep.equal({
      error: 'Invalid request',
      code: 'INVALID_ARGUMENT',
      message: 'sessionId must be between 12 and 128 characters',
    });
  });
});

describe('auth-server rate limiting', () => {
  let running: RunningServer;

  before(async () => {
    running = await startServer(2);
  });

  after(async () => {
    await stopServer(running);
  });

  it('answers 429 once the per-minute budget is spent', async () => {
    const body = { user: 'alice', y1: '02', y2: '03' };
    expect((await postJson(running.baseUrl, '/register', body)).status).to.equal(200);
    expect((await postJson(running.baseUrl, '/register', body)).status).to.equal(200);

    const limited = await postJson(running.baseUrl, '/register', body);
    expect(limited).to.deep.equal({
      status: 429,
      body: {
        error: 'Too many requests',
        code: 'RATE_LIMITED',
        message: 'Too many requests, please try again later.',
      },
    });
  });

  it('does not limit the health check', async () => {
    const res = await fetch(`${running.baseUrl}/health`);
    expect(res.status).to.equal(200);
  });
});

describe('statusForKind', () => {
  it('maps every protocol outcome to a status', () => {
    expect(statusForKind('NOT_FOUND').status).to.equal(404);
    expect(statusForKind('INVALID_ARGUMENT').status).to.equal(400);
    expect(statusForKind('INVALID_PROOF').status).to.equal(401);
    expect(statusForKind('INTERNAL').status).to.equal(500);
  });
});
