import http from 'node:http';
import express from 'express';
import cors from 'cors';
import { config } from './config.js';
import { createPlaywrightLauncher } from './browser/playwrightFrameSource.js';
import { logger } from './lib/logger.js';
import { StreamSession } from './lib/streamSession.js';
import { createHealthRouter } from './routes/health.js';
import { registerWebSocketServer } from './ws/server.js';

async function boot(): Promise<void> {
  const session = new StreamSession(
    createPlaywrightLauncher({
      viewport: config.viewport,
      startUrl: config.startUrl,
      jpegQuality: config.jpegQuality,
      mirror: config.mirrorEnabled,
    }),
    {
      viewport: config.viewport,
      defaultUrlScheme: config.defaultUrlScheme,
      fps: config.captureFps,
      idlePollMs: config.idlePollMs,
      sourceRetryMs: config.sourceRetryMs,
    },
  );

  const app = express();

  app.use(
    cors({
      origin: config.corsOrigins,
      credentials: true,
    }),
  );

  app.get('/', (_req, res) => {
    res.json({
      name: 'Pagecast Relay',
      version: '0.1.0',
      ws: config.wsPath,
    });
  });

  app.use('/health', createHealthRouter(session));

  const server = http.createServer(app);
  const wss = registerWebSocketServer(server, session, {
    path: config.wsPath,
    heartbeatMs: config.heartbeatMs,
    maxBufferedBytes: config.maxBufferedBytes,
  });

  await session.start();

  server.listen(config.port, () => {
    logger.info({ port: config.port, streaming: session.streaming }, 'server_started');
  });

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    logger.info({ signal }, 'shutting_down');
    try {
      await session.stop();
    } catch (err) {
      logger.error({ err }, 'session_stop_failed');
    }
    for (const client of wss.clients) client.terminate();
    wss.close();
    server.close(() => process.exit(0));
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, 'shutdown_failed');
      process.exit(1);
    });
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

boot().catch((err: unknown) => {
  logger.fatal({ err }, 'boot_failed');
  process.exit(1);
});
