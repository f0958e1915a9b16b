import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { maskConfig } from '../../shared/config.js';

export const VERSION = '0.1.0';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/health
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      version: VERSION,
      uptime: process.uptime(),
      scheduler: ctx.scheduler.status().running ? 'running' : 'stopped',
    });
  });

  // GET /api/config: current config, api_key masked
  app.get('/config', (c) => c.json(maskConfig(ctx.config)));

  return app;
}
