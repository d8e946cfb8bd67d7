import { Router } from 'express';
import type { StreamSession } from '../lib/streamSession.js';

export function createHealthRouter(session: StreamSession): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    const meta = session.describe();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      session: session.status,
      streaming: session.streaming,
      viewers: session.registry.size,
      pendingEvents: session.pipeline.queued,
      url: meta.url,
      viewport: meta.viewport,
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
