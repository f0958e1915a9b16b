import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { ValidationError } from '../../shared/errors.js';

export function memoryRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/memory/sweep[?retention_days=]: defaults to the rules' retention
  app.post('/memory/sweep', (c) => {
    const raw = c.req.query('retention_days');
    let days: number | undefined;
    if (raw !== undefined && raw.trim() !== '') {
      days = Number(raw);
      if (!Number.isInteger(days) || days < 0) {
        throw new ValidationError(`retention_days must be a non-negative integer: ${raw}`);
      }
    }
    return c.json(ctx.scheduler.sweep(days));
  });

  return app;
}
