import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { summarizeRun } from '../../engine/pipeline.js';

export function runRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /run: execute one run synchronously
  app.get('/run', async (c) => {
    const report = await ctx.trigger();
    return c.text(summarizeRun(report));
  });

  // GET /runs/last: report of the most recent completed run
  app.get('/runs/last', (c) => {
    const report = ctx.gate.lastReport;
    if (!report) {
      return c.json({ message: 'No run has completed yet' }, 404);
    }
    return c.json(report);
  });

  return app;
}
