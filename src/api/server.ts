import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Config } from '../shared/config.js';
import { loadConfig } from '../shared/config.js';
import { NewsDigestError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { APP_VERSION } from '../shared/version.js';
import { RunGate, createServices, executeRun } from '../engine/runner.js';
import type { RunServices } from '../engine/runner.js';
import type { RunReport } from '../engine/pipeline.js';
import { startScheduler, stopScheduler } from '../push/scheduler.js';
import { systemRoutes } from './routes/system.js';
import { runRoutes } from './routes/run.js';

export interface AppContext {
  config: Config;
  gate: RunGate;
  /** Start one gated run; rejects with RunInProgressError while another is active. */
  trigger: () => Promise<RunReport>;
}

export function createContext(config: Config, services: RunServices): AppContext {
  const gate = new RunGate();
  return {
    config,
    gate,
    trigger: () => gate.run((runId) => executeRun(config, services, runId)),
  };
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.route('/', systemRoutes(ctx));
  app.route('/', runRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof NewsDigestError) {
      const status = errorCodeToHttpStatus(err.code);
      if (status >= 500) {
        logger.error({ error: err.message, code: err.code }, 'Request failed');
      }
      return c.text(err.message, status);
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.text('Internal server error', 500);
  });

  app.notFound((c) => c.text('Not found', 404));

  return app;
}

function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'RUN_IN_PROGRESS':
      return 409;
    case 'CONFIG_ERROR':
    case 'CREDENTIAL_ERROR':
      return 400;
    case 'LLM_ERROR':
    case 'SEARCH_ERROR':
    case 'STORE_ERROR':
      return 502;
    default:
      return 500;
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  const config = await loadConfig();
  const port = opts.port ?? config.server.port;
  const host = config.server.host;

  const ctx = createContext(config, createServices(config));
  const app = createApp(ctx);

  logger.info({ port, host, version: APP_VERSION, store: config.store.backend }, 'Starting AI News Digest server');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Server listening');
  });

  startScheduler(config.schedule, ctx.trigger);

  const shutdown = () => {
    logger.info('Shutting down...');
    stopScheduler();
    server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
