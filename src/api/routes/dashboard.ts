import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { RecordTypeSchema } from '../../archive/types.js';
import { ValidationError } from '../../shared/errors.js';
import { normalizeId } from '../../trace/context.js';

export function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`limit must be a positive integer: ${raw}`);
  }
  return value;
}

export function dashboardRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /api/dashboard?record_type=&trace_id=&limit=: archived topics and drafts, newest first
  app.get('/dashboard', (c) => {
    const rawType = c.req.query('record_type');
    let recordType: 'topic' | 'draft' | undefined;
    if (rawType) {
      const parsed = RecordTypeSchema.safeParse(rawType);
      if (!parsed.success) {
        throw new ValidationError(`Unknown record_type: ${rawType}`, { allowed: RecordTypeSchema.options });
      }
      recordType = parsed.data;
    }

    const items = ctx.packages.list({
      recordType,
      traceId: normalizeId(c.req.query('trace_id')) || undefined,
      limit: parseLimit(c.req.query('limit')),
    });
    return c.json({ count: items.length, items });
  });

  return app;
}
