import http from 'node:http';
import express from 'express';
import { afterEach, describe, expect, it } from 'vitest';
import { createHealthRouter } from '../src/routes/health.js';
import { StreamSession } from '../src/lib/streamSession.js';
import { FakeConnection, FakeFrameSource, fakeLauncher } from './helpers/fakes.js';

const options = {
  viewport: { width: 1280, height: 720 },
  defaultUrlScheme: 'http',
  fps: 5,
  idlePollMs: 500,
  sourceRetryMs: 1000,
};

describe('GET /health', () => {
  let server: http.Server | null = null;
  let session: StreamSession | null = null;

  const fetchHealth = async (target: StreamSession) => {
    const app = express();
    app.use('/health', createHealthRouter(target));
    const httpServer = http.createServer(app);
    server = httpServer;
    await new Promise<void>((resolve) => httpServer.listen(0, '127.0.0.1', resolve));
    const address = httpServer.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    const response = await fetch(`http://127.0.0.1:${address.port}/health`);
    return { status: response.status, body: await response.json() };
  };

  afterEach(async () => {
    await session?.stop();
    session = null;
    const httpServer = server;
    server = null;
    if (httpServer) {
      await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    }
  });

  it('reports a streaming session with its page and viewers', async () => {
    session = new StreamSession(
      fakeLauncher({ primary: new FakeFrameSource({ url: 'https://example.org/', viewport: { width: 800, height: 600 } }) }),
      options,
    );
    await session.start();
    session.registry.add(new FakeConnection('v1'));

    const { status, body } = await fetchHealth(session);

    expect(status).toBe(200);
    expect(body).toMatchObject({
      status: 'ok',
      session: 'running',
      streaming: true,
      viewers: 1,
      pendingEvents: 0,
      url: 'https://example.org/',
      viewport: { width: 800, height: 600 },
    });
  });

  it('reports a degraded session when the page never came up', async () => {
    session = new StreamSession(fakeLauncher({ primary: new Error('no browser') }), options);
    await session.start();

    const { body } = await fetchHealth(session);

    expect(body).toMatchObject({
      status: 'ok',
      session: 'degraded',
      streaming: false,
      viewers: 0,
      url: '',
      viewport: { width: 1280, height: 720 },
    });
  });
});
