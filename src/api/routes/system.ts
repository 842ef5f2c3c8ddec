import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { APP_VERSION } from '../../shared/version.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /: liveness text
  app.get('/', (c) => c.text('AI News Digest is live.'));

  // GET /health: basic health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: APP_VERSION,
      uptime: process.uptime(),
      running: ctx.gate.running,
    });
  });

  return app;
}
