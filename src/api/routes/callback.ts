import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { ValidationError } from '../../shared/errors.js';

const TRUTHY = new Set(['1', 'true', 'yes']);

export function callbackRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST /api/callback[?force=1]: confirmation events from the review table
  app.post('/callback', async (c) => {
    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch (err) {
      throw new ValidationError('Callback body is not valid JSON', {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    const force = TRUTHY.has((c.req.query('force') ?? '').toLowerCase());
    const result = await ctx.expander.onConfirmationEvent(payload, { force });

    // The handshake answer must be the bare challenge object.
    if (result.status === 'challenge') {
      return c.json({ challenge: result.challenge });
    }
    return c.json(result);
  });

  return app;
}
