import { Hono } from 'hono';
import type { AppContext } from '../server.js';

export function pipelineRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/pipeline/run_once[?source_id=]: one cycle per enabled source, or one source
  app.post('/pipeline/run_once', async (c) => {
    const sourceId = c.req.query('source_id')?.trim() || undefined;
    const result = await ctx.scheduler.runOnce(sourceId, 'api');
    return c.json(result);
  });

  // GET /api/pipeline/status
  app.get('/pipeline/status', (c) => c.json(ctx.scheduler.status()));

  // POST /api/pipeline/reload: reread the rules file even if unchanged
  app.post('/pipeline/reload', (c) => c.json(ctx.scheduler.reload()));

  return app;
}
