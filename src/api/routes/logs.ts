import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { queryLogs } from '../../trace/logStore.js';
import { normalizeId } from '../../trace/context.js';
import { ValidationError } from '../../shared/errors.js';
import { parseLimit } from './dashboard.js';

export function logRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  const maxLimit = ctx.config.logs.max_query_limit;

  // GET /api/logs?trace_id=&request_id=&component=&level=&keyword=&limit=
  app.get('/logs', (c) => {
    const logs = queryLogs(
      ctx.db,
      {
        traceId: c.req.query('trace_id'),
        requestId: c.req.query('request_id'),
        component: c.req.query('component'),
        level: c.req.query('level'),
        keyword: c.req.query('keyword'),
        limit: parseLimit(c.req.query('limit')),
      },
      maxLimit,
    );
    return c.json({ count: logs.length, logs });
  });

  // GET /api/logs/trace/:traceId: logs and packages of one topic, drafts included
  app.get('/logs/trace/:traceId', (c) => {
    const traceId = normalizeId(c.req.param('traceId'));
    if (!traceId) throw new ValidationError('traceId is required');

    const logs = queryLogs(ctx.db, { traceId, limit: parseLimit(c.req.query('limit')) ?? maxLimit }, maxLimit);
    const packages = ctx.packages.list({ traceId, limit: 200 });
    return c.json({ trace_id: traceId, count: logs.length, logs, packages });
  });

  return app;
}
