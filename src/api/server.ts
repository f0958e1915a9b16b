import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { PresslineError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getPresslineDir } from '../shared/utils.js';
import { writeExampleRules } from '../rules/loader.js';
import { closeRuntime, openRuntime, type Runtime } from '../runtime.js';
import { traceContext } from './middleware.js';
import { systemRoutes } from './routes/system.js';
import { pipelineRoutes } from './routes/pipeline.js';
import { callbackRoutes } from './routes/callback.js';
import { dashboardRoutes } from './routes/dashboard.js';
import { logRoutes } from './routes/logs.js';
import { memoryRoutes } from './routes/memory.js';
import { archiveRoutes } from './routes/archive.js';

export type AppContext = Runtime;

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  // Middleware
  app.use('*', cors());
  app.use('*', traceContext());

  // Mount route groups
  app.route('/api', systemRoutes(ctx));
  app.route('/api', pipelineRoutes(ctx));
  app.route('/api', callbackRoutes(ctx));
  app.route('/api', dashboardRoutes(ctx));
  app.route('/api', logRoutes(ctx));
  app.route('/api', memoryRoutes(ctx));
  app.route('/', archiveRoutes(ctx));

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof PresslineError) {
      return c.json({ error: err.message, code: err.code, details: err.details }, errorCodeToHttpStatus(err.code));
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'VALIDATION_ERROR':
    case 'RULES_ERROR':
    case 'CONFIG_ERROR':
      return 400;
    case 'WORKER_ERROR':
      return 502;
    default:
      return 500;
  }
}

/**
 * First-run setup: default config under ~/.pressline/ and the example rules at
 * the configured rules path. Existing files are left alone.
 */
export async function autoInit(): Promise<void> {
  const configPath = path.join(getPresslineDir(), 'config.yaml');
  if (!fs.existsSync(configPath)) {
    writeDefaultConfig(configPath);
    logger.info({ path: configPath }, 'First run: created config');
  }

  const config = await loadConfig();
  if (writeExampleRules(config.rules.path)) {
    logger.info({ path: config.rules.path }, 'First run: created example rules');
  }
}

export async function startServer(opts: { port?: number } = {}): Promise<void> {
  await autoInit();

  const runtime = await openRuntime();
  const port = opts.port ?? runtime.config.server.port;
  const host = runtime.config.server.host;
  const app = createApp(runtime);

  logger.info({ port, host }, 'Starting Pressline server');

  serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info({ url: `http://${host}:${info.port}` }, 'Pressline listening');
  });

  runtime.scheduler.start();

  // Handle graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    closeRuntime(runtime);
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
